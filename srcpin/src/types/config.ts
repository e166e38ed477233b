/** Configuration types: the layered config after validation. */
export type RegistryPreference = "none" | "ecr-public" | "mcr";

export type HttpConfig = {
  timeout_ms: number;
  github_api_url: string;
};

export type GitConfig = {
  timeout_ms: number;
};

export type RegistryConfig = {
  prefer: RegistryPreference;
  crane_bin: string;
};

export type SrcpinConfig = {
  schema_version: string;
  http: HttpConfig;
  git: GitConfig;
  registry: RegistryConfig;
  github?: { token?: string };
  log: { level: "debug" | "info" | "warn" | "error" };
};
