const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Request headers the response varies by (per its `Vary` header) that were
 * actually sent, keyed by lowercase name. Replaying them reproduces the body.
 *
 * `Vary: *` varies on things no request header captures, so nothing is kept.
 */
export function extractVaryHeaders(request: Headers, response: Headers): Record<string, string> {
  const headers: Record<string, string> = {};
  const vary = response.get("vary");
  if (!vary || vary.trim() === "*") return headers;

  for (const raw of vary.split(",")) {
    const name = raw.trim();
    if (!HEADER_NAME.test(name)) continue;
    const value = request.get(name);
    if (value) headers[name.toLowerCase()] = value;
  }
  return headers;
}
