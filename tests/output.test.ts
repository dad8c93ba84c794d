import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { OUTPUT_FILES, readMeta, writeRepoMap } from "../src/output.js";
import type { RepoMapMeta } from "../src/types.js";

const META: RepoMapMeta = {
  projectName: "Demo",
  symbolCount: 4,
  moduleCount: 1,
  fileCount: 2,
  skippedFiles: 0,
  edgeCount: 2,
  unresolvedReferences: 0,
  converged: true,
  iterationsUsed: 12,
  generatedAt: "2024-01-01T00:00:00.000Z",
  tokens: { l1: 10, l2: 20, l3: 30 },
  bySymbolKind: { class: 2, method: 2 },
  topModules: [{ name: "Core", types: 2 }],
};

describe("writeRepoMap", () => {
  it("writes the three layers and the meta record", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "sharpmap-output-"));
    const outDir = path.join(dir, "out");

    const written = writeRepoMap(
      outDir,
      { skeleton: "# L1\n", signatures: "# L2\n", relations: "# L3\n" },
      META,
    );

    expect(written.skeleton).toBe(path.join(outDir, OUTPUT_FILES.skeleton));
    expect(fs.readFileSync(written.skeleton, "utf8")).toBe("# L1\n");
    expect(fs.readFileSync(path.join(outDir, "repomap-L2-signatures.md"), "utf8")).toBe("# L2\n");
    expect(fs.readFileSync(path.join(outDir, "repomap-L3-relations.md"), "utf8")).toBe("# L3\n");
    expect(readMeta(outDir)).toEqual(META);

    const record = JSON.parse(fs.readFileSync(path.join(outDir, OUTPUT_FILES.meta), "utf8"));
    expect(Object.keys(record)).toEqual([
      "project_name",
      "symbol_count",
      "module_count",
      "file_count",
      "skipped_files",
      "edge_count",
      "unresolved_references",
      "converged",
      "iterations_used",
      "generated_at",
      "tokens",
      "by_symbol_kind",
      "top_modules",
    ]);
    expect(record.generated_at).toBe("2024-01-01T00:00:00.000Z");
    expect(record.top_modules).toEqual([{ name: "Core", types: 2 }]);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("readMeta", () => {
  it("returns null when nothing usable is there", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "sharpmap-output-"));
    expect(readMeta(dir)).toBeNull();

    fs.writeFileSync(path.join(dir, OUTPUT_FILES.meta), "{}");
    expect(readMeta(dir)).toBeNull();

    fs.writeFileSync(path.join(dir, OUTPUT_FILES.meta), JSON.stringify({ ...META }));
    expect(readMeta(dir)).toBeNull();

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
