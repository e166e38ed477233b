/** Source references extracted from build manifests, and the tasks built from them. */
export type SourceKind = "image" | "http" | "git";

type ReferenceBase = {
  /** Literal as it appeared in the manifest. Also the dedup key. */
  original: string;
  /** 1-based line in the manifest, 0 when unknown. */
  line: number;
};

export type ImageReference = ReferenceBase & { kind: "image" };

export type HttpReference = ReferenceBase & { kind: "http" };

export type GitReference = ReferenceBase & {
  kind: "git";
  remote: string;
  ref: string;
  subdir: string;
};

export type SourceReference = ImageReference | HttpReference | GitReference;

/** One manifest's references, each list in manifest order. */
export type ManifestReferences = {
  source: string;
  images: ImageReference[];
  http: HttpReference[];
  git: GitReference[];
};

export type Task<R extends SourceReference = SourceReference> = {
  reference: R;
  /** Position of first occurrence across every collected manifest. */
  orderIndex: number;
  key: string;
};

export type TaskSet = {
  images: Task<ImageReference>[];
  http: Task<HttpReference>[];
  git: Task<GitReference>[];
};
