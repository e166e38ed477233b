export const VERSION = "0.1.0";

/** Sent as `User-Agent` on every outbound request. */
export function userAgent(): string {
  return `srcpin/${VERSION}`;
}
