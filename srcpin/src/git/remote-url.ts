export type GitRemoteRef = {
  /** Remote URL without the fragment. */
  remote: string;
  /** Branch, tag or commit; HEAD when the fragment names none. */
  ref: string;
  /** Subdirectory after `:` in the fragment; not used for resolution. */
  subdir: string;
};

/**
 * Split `<remote>[#<ref>[:<subdir>]]`.
 *
 *   https://github.com/owner/repo.git#v1.0.0
 *   https://github.com/owner/repo.git#main:docs
 *   git@github.com:owner/repo.git#branch
 */
export function parseGitUrl(rawUrl: string): GitRemoteRef {
  const hash = rawUrl.indexOf("#");
  const remote = hash === -1 ? rawUrl : rawUrl.slice(0, hash);
  const fragment = hash === -1 ? "" : rawUrl.slice(hash + 1);

  const colon = fragment.indexOf(":");
  const ref = colon === -1 ? fragment : fragment.slice(0, colon);
  const subdir = colon === -1 ? "" : fragment.slice(colon + 1);

  return { remote, ref: ref === "" ? "HEAD" : ref, subdir };
}
