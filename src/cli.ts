#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  CONFIG_DIR,
  defaultConfig,
  findConfigFile,
  loadConfig,
  serializeConfig,
  validateConfig,
  toRawConfig,
} from "./config.js";
import { errorMessage } from "./errors.js";
import { generateRepoMap, loadSourceFiles } from "./repoMap.js";
import { readMeta, toMetaRecord, writeRepoMap } from "./output.js";
import type { LayerDocuments, RepoMapConfig, RepoMapMeta } from "./types.js";

const LAYERS = ["skeleton", "signatures", "relations"] as const;
const STATUS_TOP_MODULES = 5;

type Overrides = {
  source?: string;
  out?: string;
  project?: string;
};

function applyOverrides(config: RepoMapConfig, overrides: Overrides): RepoMapConfig {
  const raw = toRawConfig(config);
  if (overrides.source) raw.source_root = overrides.source;
  if (overrides.out) raw.output_dir = overrides.out;
  if (overrides.project) raw.project_name = overrides.project;
  return validateConfig(raw);
}

function formatMeta(meta: RepoMapMeta): string {
  const kinds = Object.entries(meta.bySymbolKind)
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1))
    .map(([kind, count]) => `${kind}: ${count}`)
    .join(", ");
  return [
    `Project: ${meta.projectName}`,
    `Generated: ${meta.generatedAt}`,
    `Files: ${meta.fileCount} (${meta.skippedFiles} skipped)`,
    `Symbols: ${meta.symbolCount} in ${meta.moduleCount} modules${kinds ? ` (${kinds})` : ""}`,
    `Edges: ${meta.edgeCount} (${meta.unresolvedReferences} unresolved references)`,
    `Ranking: ${meta.converged ? "converged" : "not fully converged"} after ${meta.iterationsUsed} iterations`,
    `Tokens: L1 ${meta.tokens.l1}, L2 ${meta.tokens.l2}, L3 ${meta.tokens.l3}`,
    ...(meta.topModules.length > 0 ? ["Top modules:"] : []),
    ...meta.topModules
      .slice(0, STATUS_TOP_MODULES)
      .map((m) => `  - ${m.name} (${m.types} types)`),
  ].join("\n");
}

const cli = yargs(hideBin(process.argv))
  .scriptName("sharpmap")
  .usage("$0 [command] [options]")
  .option("dir", {
    alias: "C",
    type: "string",
    describe: "Project directory",
    default: process.cwd(),
    global: true,
  })
  .option("config", {
    alias: "c",
    type: "string",
    describe: `Config file (default: ${CONFIG_DIR}/config.yaml)`,
    global: true,
  })
  .option("verbose", {
    alias: "v",
    type: "boolean",
    default: false,
    describe: "Print pipeline progress",
    global: true,
  })
  .command(
    ["generate", "$0"],
    "Analyze the source tree and write the layered map",
    (y) =>
      y
        .option("source", {
          type: "string",
          describe: "Source root, relative to --dir",
        })
        .option("out", {
          alias: "o",
          type: "string",
          describe: "Output directory, relative to --dir",
        })
        .option("project", {
          type: "string",
          describe: "Project name shown in the documents",
        })
        .option("print", {
          type: "string",
          choices: LAYERS,
          describe: "Also print one layer to stdout",
        }),
    (argv) => {
      const root = path.resolve(argv.dir);
      const loaded = loadConfig(root, argv.config);
      const config = applyOverrides(loaded.config, {
        source: argv.source,
        out: argv.out,
        project: argv.project,
      });
      const log = (message: string): void => {
        if (argv.verbose) console.error(`[sharpmap] ${message}`);
      };

      log(loaded.path ? `config: ${loaded.path}` : "config: defaults");
      const { files } = loadSourceFiles(config, { baseDir: root });
      log(`discovered ${files.length} files under ${path.resolve(root, config.sourceRoot)}`);

      const result = generateRepoMap(files, config, { onProgress: log });
      const written = writeRepoMap(path.resolve(root, config.outputDir), result, result.meta);

      const print: keyof LayerDocuments | undefined = LAYERS.find((layer) => layer === argv.print);
      if (print) {
        process.stdout.write(result[print]);
        return;
      }
      console.log(formatMeta(result.meta));
      console.log(`Wrote ${path.relative(root, written.skeleton)}, ${path.relative(root, written.signatures)}, ${path.relative(root, written.relations)}`);
    },
  )
  .command(
    "init",
    "Write a default config file",
    (y) =>
      y.option("force", {
        type: "boolean",
        default: false,
        describe: "Overwrite an existing config file",
      }),
    (argv) => {
      const root = path.resolve(argv.dir);
      const existing = findConfigFile(root);
      if (existing && !argv.force) {
        throw new Error(`Config already exists: ${path.relative(root, existing)} (use --force to overwrite)`);
      }
      const target = existing ?? path.join(root, CONFIG_DIR, "config.yaml");
      const config = applyOverrides(defaultConfig(), { project: path.basename(root) });
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, serializeConfig(config), "utf8");
      console.log(`Wrote ${path.relative(root, target)}`);
    },
  )
  .command(
    "status",
    "Show the metadata of the last generated map",
    (y) =>
      y.option("json", {
        type: "boolean",
        default: false,
        describe: "Print the raw metadata record",
      }),
    (argv) => {
      const root = path.resolve(argv.dir);
      const { config } = loadConfig(root, argv.config);
      const meta = readMeta(path.resolve(root, config.outputDir));
      if (!meta) {
        console.log("No repo map generated yet. Run `sharpmap generate`.");
        return;
      }
      console.log(argv.json ? JSON.stringify(toMetaRecord(meta), null, 2) : formatMeta(meta));
    },
  )
  .strict()
  .help()
  .version();

async function main() {
  await cli.parse();
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
