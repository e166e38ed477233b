/** Resolution results, one variant per source kind. */
export type PinResult = {
  kind: "image";
  original: string;
  /** Fully qualified reference carrying the manifest digest. */
  pinned: string;
};

export type ChecksumResult = {
  kind: "http";
  url: string;
  /** Always `sha256:<64 hex>`. */
  checksum: string;
  /** Lowercase request header name → value, from the response's Vary list. */
  headers: Record<string, string>;
};

export type CommitResult = {
  kind: "git";
  url: string;
  /** 40 lowercase hex characters. */
  commit: string;
};

export type ResolutionResult = PinResult | ChecksumResult | CommitResult;
