export const ECHO_PREFIX = "/echo/";
export const FILES_PREFIX = "/files/";
export const USER_AGENT_PATH = "/user-agent";

export type RouteKind =
  | "echo"
  | "user-agent"
  | "file-get"
  | "file-post"
  | "success"
  | "not-found";

/**
 * Map a method and raw path to the route that serves it. Plain prefix and
 * equality checks, first match wins; no query parsing or slash
 * normalization.
 */
export function routeRequest(method: string, path: string): RouteKind {
  if (path.startsWith(ECHO_PREFIX)) {
    return "echo";
  }
  if (path === USER_AGENT_PATH) {
    return "user-agent";
  }
  if (path.startsWith(FILES_PREFIX)) {
    if (method === "GET") return "file-get";
    if (method === "POST") return "file-post";
    return "not-found";
  }
  if (path === "/") {
    return "success";
  }
  return "not-found";
}
