/**
 * Source policy document and the builders that add pin rules to it.
 * The layout follows BuildKit's source policy JSON (`sourcepolicy/pb`).
 */
export type PolicyAction = "ALLOW" | "DENY" | "CONVERT";

export type MatchType = "WILDCARD" | "EXACT" | "REGEX";

export type Selector = {
  identifier: string;
  match_type: MatchType;
};

export type Update = {
  identifier?: string;
  attrs?: Record<string, string>;
};

export type Rule = {
  action: PolicyAction;
  selector: Selector;
  updates: Update;
};

export type Policy = {
  version: number;
  rules: Rule[];
};

export const DOCKER_IMAGE_SCHEME = "docker-image://";
export const HTTP_CHECKSUM_ATTR = "http.checksum";
export const HTTP_HEADER_ATTR_PREFIX = "http.header.";
export const GIT_CHECKSUM_ATTR = "git.checksum";

export function newPolicy(): Policy {
  return { version: 1, rules: [] };
}

function exact(identifier: string): Selector {
  return { identifier, match_type: "EXACT" };
}

/** Rewrite `docker-image://<original>` to the digest-pinned reference. */
export function addPinRule(policy: Policy, original: string, pinned: string): void {
  policy.rules.push({
    action: "CONVERT",
    selector: exact(DOCKER_IMAGE_SCHEME + original),
    updates: { identifier: DOCKER_IMAGE_SCHEME + pinned },
  });
}

/**
 * Require a checksum for an HTTP source. Captured request headers become
 * `http.header.<name>` attributes, sorted by name so output is stable.
 */
export function addHttpChecksumRule(
  policy: Policy,
  url: string,
  checksum: string,
  headers: Record<string, string> = {},
): void {
  const attrs: Record<string, string> = { [HTTP_CHECKSUM_ATTR]: checksum };
  for (const name of Object.keys(headers).sort()) {
    attrs[HTTP_HEADER_ATTR_PREFIX + name.toLowerCase()] = headers[name];
  }
  policy.rules.push({ action: "CONVERT", selector: exact(url), updates: { attrs } });
}

/** Require a commit for a git source; `url` is the literal including its fragment. */
export function addGitChecksumRule(policy: Policy, url: string, commit: string): void {
  policy.rules.push({
    action: "CONVERT",
    selector: exact(url),
    updates: { attrs: { [GIT_CHECKSUM_ATTR]: commit } },
  });
}

export function serializePolicy(policy: Policy): string {
  return JSON.stringify(policy, null, 2) + "\n";
}
