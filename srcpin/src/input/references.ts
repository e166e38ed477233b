import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { parseGitUrl } from "../git/remote-url.js";
import { diag, type Diagnostic } from "../log/logger.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ManifestReferences } from "../types/references.js";

/** One extracted reference as written in a references document. */
export type ReferenceEntry = { original: string; line?: number };

/** The document a manifest parser writes: its extracted references per manifest. */
export type ReferencesDocument = {
  manifests: {
    source: string;
    images?: ReferenceEntry[];
    http?: ReferenceEntry[];
    git?: ReferenceEntry[];
  }[];
};

export type LoadReferencesResult =
  | { ok: true; manifests: ManifestReferences[] }
  | { ok: false; errors: Diagnostic[] };

/** Turn a validated document into typed manifest references, keeping document order. */
export function toManifestReferences(doc: ReferencesDocument): ManifestReferences[] {
  return doc.manifests.map((m) => ({
    source: m.source,
    images: (m.images ?? []).map((e) => ({ kind: "image" as const, original: e.original, line: e.line ?? 0 })),
    http: (m.http ?? []).map((e) => ({ kind: "http" as const, original: e.original, line: e.line ?? 0 })),
    git: (m.git ?? []).map((e) => ({ kind: "git" as const, original: e.original, line: e.line ?? 0, ...parseGitUrl(e.original) })),
  }));
}

/**
 * Read references documents (YAML or JSON) in argument order. Every file is
 * checked so one run reports every broken input.
 */
export async function loadReferences(files: string[], schemas: SchemaRegistry): Promise<LoadReferencesResult> {
  const manifests: ManifestReferences[] = [];
  const errors: Diagnostic[] = [];

  for (const file of files) {
    const filePath = path.resolve(file);
    const shown = path.relative(process.cwd(), filePath) || filePath;

    let doc: unknown;
    try {
      doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      errors.push(diag("error", "REFERENCES_READ_FAILED", `Failed to read references (${shown}): ${message}`, { path: filePath }));
      continue;
    }

    const check = await schemas.check<ReferencesDocument>("references", doc);
    if (!check.valid) {
      errors.push(diag("error", "REFERENCES_INVALID", `References invalid (${shown}): ${check.errors}`, { path: filePath }));
      continue;
    }
    manifests.push(...toManifestReferences(check.value));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, manifests };
}
