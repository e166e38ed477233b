import { FatalError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { RegistryLookupError, type RegistryClient } from "../registry/client.js";
import type { PinResult } from "../types/results.js";
import { MIRRORS, mapToMirror, type MirrorName } from "./mirrors.js";
import { formatImageReference, parseImageReference, parseManifestDigest, type ImageName } from "./reference.js";

export type ImageResolverOptions = {
  registry: RegistryClient;
  /** Pin official Docker Hub images to this mirror when it carries them. */
  prefer?: MirrorName;
  logger?: Logger;
};

/** The registry needs a tag or digest; an untagged reference means `latest`. */
function lookupName(ref: ImageName): string {
  return formatImageReference(ref.tag || ref.digest ? ref : { ...ref, tag: "latest" });
}

export class ImageResolver {
  private readonly registry: RegistryClient;
  private readonly prefer?: MirrorName;
  private readonly logger: Logger;

  constructor(opts: ImageResolverOptions) {
    this.registry = opts.registry;
    this.prefer = opts.prefer;
    this.logger = opts.logger ?? silentLogger;
  }

  async resolve(original: string, opts: { signal?: AbortSignal } = {}): Promise<PinResult> {
    const ref = parseImageReference(original);

    const mirrored = await this.tryMirror(original, ref, opts.signal);
    if (mirrored) return mirrored;

    const digest = await this.registry.getDigest(lookupName(ref), { signal: opts.signal });
    return this.pin(original, ref, digest);
  }

  /** Null means "use the original registry". */
  private async tryMirror(original: string, ref: ImageName, signal?: AbortSignal): Promise<PinResult | null> {
    if (!this.prefer) return null;
    const mapped = mapToMirror(ref, MIRRORS[this.prefer]);
    if (!mapped) return null;

    try {
      const digest = await this.registry.getDigest(lookupName(mapped), { signal });
      return this.pin(original, mapped, digest);
    } catch (err) {
      if (err instanceof RegistryLookupError && err.reason !== "other") {
        this.logger.debug("MIRROR_MISS", `${formatImageReference(mapped)} unavailable (${err.reason}), using ${original}`);
        return null;
      }
      throw new FatalError(`failed to check image ${formatImageReference(mapped)}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private pin(original: string, ref: ImageName, rawDigest: string): PinResult {
    const digest = parseManifestDigest(rawDigest);
    return { kind: "image", original, pinned: formatImageReference({ ...ref, digest }) };
  }
}
