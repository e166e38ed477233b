import { DOCKER_HUB, type ImageName } from "./reference.js";

export type MirrorName = "ecr-public" | "mcr";

export type Mirror = {
  name: MirrorName;
  domain: string;
  /** Prepended to `library/<image>`. */
  pathPrefix: string;
};

export const MIRRORS: Record<MirrorName, Mirror> = {
  "ecr-public": { name: "ecr-public", domain: "public.ecr.aws", pathPrefix: "docker/" },
  mcr: { name: "mcr", domain: "mcr.microsoft.com", pathPrefix: "mirror/docker/" },
};

/** Only official Docker Hub images (docker.io/library/*) have mirror copies. */
export function canMirror(ref: ImageName): boolean {
  return ref.domain === DOCKER_HUB && ref.path.startsWith("library/");
}

/**
 * `docker.io/library/alpine:3.20` → `public.ecr.aws/docker/library/alpine:3.20`.
 * Returns null for images that have no mirror copy.
 */
export function mapToMirror(ref: ImageName, mirror: Mirror): ImageName | null {
  if (!canMirror(ref)) return null;
  return { domain: mirror.domain, path: mirror.pathPrefix + ref.path, tag: ref.tag, digest: ref.digest };
}
