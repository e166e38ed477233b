import { FatalError } from "../errors.js";

/** A normalised image reference: `domain/path[:tag][@digest]`. */
export type ImageName = {
  domain: string;
  path: string;
  tag?: string;
  digest?: string;
};

export const DOCKER_HUB = "docker.io";
const LEGACY_DOCKER_HUB = "index.docker.io";

const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG = /^[\w][\w.-]{0,127}$/;
const DIGEST = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-fA-F0-9]{32,}$/;
const SHA256_DIGEST = /^sha256:[a-f0-9]{64}$/;

function looksLikeDomain(component: string): boolean {
  return component.includes(".") || component.includes(":") || component === "localhost" || /[A-Z]/.test(component);
}

/** True when the literal already names a digest, i.e. is pinned. */
export function hasDigest(literal: string): boolean {
  const at = literal.lastIndexOf("@");
  return at !== -1 && DIGEST.test(literal.slice(at + 1));
}

/**
 * Parse and normalise an image reference the way Docker does:
 * `alpine:3.20` is `docker.io/library/alpine:3.20`.
 */
export function parseImageReference(literal: string): ImageName {
  let rest = literal.trim();
  if (rest === "") throw new FatalError("empty image reference");

  let digest: string | undefined;
  const at = rest.indexOf("@");
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!DIGEST.test(digest)) throw new FatalError(`invalid digest in image reference ${literal}`);
  }

  let tag: string | undefined;
  const colon = rest.lastIndexOf(":");
  if (colon > rest.lastIndexOf("/")) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!TAG.test(tag)) throw new FatalError(`invalid tag in image reference ${literal}`);
  }

  let domain = DOCKER_HUB;
  let path = rest;
  const slash = rest.indexOf("/");
  if (slash !== -1 && looksLikeDomain(rest.slice(0, slash))) {
    domain = rest.slice(0, slash);
    path = rest.slice(slash + 1);
  }
  if (domain === LEGACY_DOCKER_HUB) domain = DOCKER_HUB;
  if (domain === DOCKER_HUB && !path.includes("/")) path = `library/${path}`;

  if (path === "" || !path.split("/").every((c) => PATH_COMPONENT.test(c))) {
    throw new FatalError(`invalid repository name in image reference ${literal}`);
  }

  return { domain, path, tag, digest };
}

export function formatImageReference(ref: ImageName): string {
  let out = `${ref.domain}/${ref.path}`;
  if (ref.tag) out += `:${ref.tag}`;
  if (ref.digest) out += `@${ref.digest}`;
  return out;
}

/** Validate a registry-returned manifest digest. Only well-formed sha256 digests pin. */
export function parseManifestDigest(value: string): string {
  const digest = value.trim();
  if (!SHA256_DIGEST.test(digest)) {
    throw new FatalError(`failed to parse digest ${JSON.stringify(value)}`);
  }
  return digest;
}
