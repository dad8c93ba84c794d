import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LayerDocuments, RepoMapMeta } from "./types.js";

export const OUTPUT_FILES = {
  skeleton: "repomap-L1-skeleton.md",
  signatures: "repomap-L2-signatures.md",
  relations: "repomap-L3-relations.md",
  meta: "repomap-meta.json",
} as const;

// The file uses snake_case keys, like the config file.
const metaRecordSchema = z.object({
  project_name: z.string(),
  symbol_count: z.number(),
  module_count: z.number(),
  file_count: z.number(),
  skipped_files: z.number(),
  edge_count: z.number(),
  unresolved_references: z.number(),
  converged: z.boolean(),
  iterations_used: z.number(),
  generated_at: z.string(),
  tokens: z.object({ l1: z.number(), l2: z.number(), l3: z.number() }),
  by_symbol_kind: z.record(z.string(), z.number()),
  top_modules: z.array(z.object({ name: z.string(), types: z.number() })),
});

export type MetaRecord = z.infer<typeof metaRecordSchema>;

export function toMetaRecord(meta: RepoMapMeta): MetaRecord {
  return {
    project_name: meta.projectName,
    symbol_count: meta.symbolCount,
    module_count: meta.moduleCount,
    file_count: meta.fileCount,
    skipped_files: meta.skippedFiles,
    edge_count: meta.edgeCount,
    unresolved_references: meta.unresolvedReferences,
    converged: meta.converged,
    iterations_used: meta.iterationsUsed,
    generated_at: meta.generatedAt,
    tokens: { ...meta.tokens },
    by_symbol_kind: { ...meta.bySymbolKind },
    top_modules: meta.topModules.map((m) => ({ ...m })),
  };
}

function fromMetaRecord(record: MetaRecord): RepoMapMeta {
  return {
    projectName: record.project_name,
    symbolCount: record.symbol_count,
    moduleCount: record.module_count,
    fileCount: record.file_count,
    skippedFiles: record.skipped_files,
    edgeCount: record.edge_count,
    unresolvedReferences: record.unresolved_references,
    converged: record.converged,
    iterationsUsed: record.iterations_used,
    generatedAt: record.generated_at,
    tokens: record.tokens,
    bySymbolKind: record.by_symbol_kind,
    topModules: record.top_modules,
  };
}

export type WrittenFiles = Record<keyof typeof OUTPUT_FILES, string>;

export function writeRepoMap(
  outDir: string,
  documents: LayerDocuments,
  meta: RepoMapMeta,
): WrittenFiles {
  fs.mkdirSync(outDir, { recursive: true });
  const written: WrittenFiles = {
    skeleton: path.join(outDir, OUTPUT_FILES.skeleton),
    signatures: path.join(outDir, OUTPUT_FILES.signatures),
    relations: path.join(outDir, OUTPUT_FILES.relations),
    meta: path.join(outDir, OUTPUT_FILES.meta),
  };
  fs.writeFileSync(written.skeleton, documents.skeleton, "utf8");
  fs.writeFileSync(written.signatures, documents.signatures, "utf8");
  fs.writeFileSync(written.relations, documents.relations, "utf8");
  fs.writeFileSync(written.meta, `${JSON.stringify(toMetaRecord(meta), null, 2)}\n`, "utf8");
  return written;
}

/** Returns null when no map has been written yet or the file is not a meta record. */
export function readMeta(outDir: string): RepoMapMeta | null {
  const metaPath = path.join(outDir, OUTPUT_FILES.meta);
  if (!fs.existsSync(metaPath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(metaPath, "utf8"));
  } catch {
    return null;
  }
  const result = metaRecordSchema.safeParse(raw);
  return result.success ? fromMetaRecord(result.data) : null;
}
