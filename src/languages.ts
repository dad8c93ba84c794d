import path from "node:path";
import type { Language } from "./types.js";

const EXTENSION_MAP: Record<string, Language> = {
  ".cs": "csharp",
  ".csx": "csharp",
};

export function detectLanguage(filePath: string): Language {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_MAP[ext] ?? "other";
}

export function canExtractSymbols(language: Language): boolean {
  return language === "csharp";
}
