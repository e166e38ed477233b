import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { loadReferences } from "../input/references.js";
import { diag, type Diagnostic } from "../log/logger.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { Policy } from "../policy/policy.js";

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

/**
 * Check references documents and/or a written policy against their schemas.
 * Every named file is checked; all failures are reported together.
 */
export async function validateAll(opts: {
  references?: string[];
  policy?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const references = opts.references ?? [];
  if (references.length === 0 && !opts.policy) {
    return { ok: false, errors: [diag("error", "NOTHING_TO_VALIDATE", "pass --references and/or --policy")] };
  }

  let schemas: SchemaRegistry;
  try {
    schemas = await createRegistry(opts.schemaDir);
  } catch (e) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", errorMessage(e))] };
  }

  const errors: Diagnostic[] = [];
  const checked: string[] = [];

  if (references.length > 0) {
    const loaded = await loadReferences(references, schemas);
    if (loaded.ok) checked.push(...references);
    else errors.push(...loaded.errors);
  }

  if (opts.policy) {
    const policyPath = path.resolve(opts.policy);
    const shown = path.relative(process.cwd(), policyPath) || policyPath;
    let doc: unknown;
    try {
      doc = JSON.parse(fs.readFileSync(policyPath, "utf8"));
    } catch (e) {
      errors.push(diag("error", "POLICY_READ_FAILED", `Failed to read policy (${shown}): ${errorMessage(e)}`, { path: policyPath }));
      doc = undefined;
    }
    if (doc !== undefined) {
      const res = await schemas.check<Policy>("policy", doc);
      if (res.valid) checked.push(opts.policy);
      else errors.push(diag("error", "POLICY_INVALID", `Policy invalid (${shown}): ${res.errors}`, { path: policyPath }));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
