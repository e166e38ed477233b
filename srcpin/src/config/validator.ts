import { loadAjv } from "../schema/ajv.js";
import type { SrcpinConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "http", "git", "registry", "log"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    http: {
      type: "object",
      required: ["timeout_ms", "github_api_url"],
      additionalProperties: false,
      properties: {
        timeout_ms: { type: "integer", minimum: 1 },
        github_api_url: { type: "string", format: "uri" },
      },
    },
    git: {
      type: "object",
      required: ["timeout_ms"],
      additionalProperties: false,
      properties: {
        timeout_ms: { type: "integer", minimum: 1 },
      },
    },
    registry: {
      type: "object",
      required: ["prefer", "crane_bin"],
      additionalProperties: false,
      properties: {
        prefer: { type: "string", enum: ["none", "ecr-public", "mcr"] },
        crane_bin: { type: "string", minLength: 1 },
      },
    },
    github: {
      type: "object",
      additionalProperties: false,
      properties: {
        token: { type: "string" },
      },
    },
    log: {
      type: "object",
      required: ["level"],
      additionalProperties: false,
      properties: {
        level: { type: "string", enum: ["debug", "info", "warn", "error"] },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: SrcpinConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<SrcpinConfig>(CONFIG_SCHEMA);
  if (validate(config)) return { valid: true, config };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
