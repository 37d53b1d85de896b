/**
 * Shared Route Parsing
 *
 * Extracts path segments from function URLs by stripping the function name
 * prefix and splitting on "/".
 *
 * @example
 * ```typescript
 * // URL: http://localhost:8787/api-v1-history/42
 * const route = parseRoute(url, "DELETE", "api-v1-history");
 * // => { resource: "42", segments: ["42"], method: "DELETE", subPath: "" }
 * ```
 */

export interface ParsedRoute {
  /** First path segment after the function name ("" for the root) */
  resource: string;
  segments: string[];
  /** HTTP method (uppercase) */
  method: string;
  /** Second path segment, if any */
  subPath: string;
}

export function parseRoute(url: URL, method: string, functionName: string): ParsedRoute {
  const path = url.pathname
    .replace(new RegExp(`^\\/${functionName}\\/?`), "")
    .replace(/^\/+/, "");

  const segments = path.split("/").filter(Boolean).map((segment) => decodeURIComponent(segment));
  const resource = segments[0] ?? "";
  const subPath = segments[1] ?? "";

  return { resource, segments, method: method.toUpperCase(), subPath };
}

/**
 * Label used for audit entries, e.g. "api-v1-history:search".
 * Numeric resources collapse to ":id" so ids do not fragment the action name.
 */
export function routeAction(functionName: string, route: ParsedRoute): string {
  if (!route.resource) return functionName;
  const resource = /^\d+$/.test(route.resource) ? ":id" : route.resource;
  return `${functionName}:${resource}`;
}
