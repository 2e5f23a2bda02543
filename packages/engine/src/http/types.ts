export interface HttpRequest {
  readonly method: string;
  /** Raw request target, exactly as received. */
  readonly path: string;
  readonly version: string;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Uint8Array;
}

export type HttpHeaders = Map<string, string> | Record<string, string>;

export interface HttpResponse {
  status: number;
  /** Defaults to HTTP/1.1. */
  version?: string;
  headers?: HttpHeaders;
  body?: Uint8Array;
}

export const DEFAULT_HTTP_VERSION = "HTTP/1.1";

export const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: "OK",
  201: "Created",
  404: "Not Found",
};

export function statusMessage(status: number): string {
  return STATUS_TEXT[status] ?? "Internal error";
}

/**
 * Look up a header by name. Names are stored as received, so an exact match
 * wins; otherwise the first case-insensitive match is returned.
 */
export function getHeader(
  headers: ReadonlyMap<string, string>,
  name: string,
): string | undefined {
  const exact = headers.get(name);
  if (exact !== undefined) return exact;

  const wanted = name.toLowerCase();
  for (const [key, value] of headers) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
