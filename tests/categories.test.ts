import { describe, it, expect } from "vitest";
import {
  DEFAULT_CATEGORY,
  ROOT_MODULE,
  categorize,
  classifyFile,
  moduleFor,
  modulePathFor,
} from "../src/categories.js";
import type { CategoryRule } from "../src/types.js";

const RULES: CategoryRule[] = [
  { label: "Gameplay", patterns: ["Game"] },
  { label: "Tests", patterns: ["**/*Tests.cs"] },
  { label: "UI", patterns: ["Assets/UI/"] },
];

describe("module paths", () => {
  it("joins directory segments with dots", () => {
    expect(modulePathFor("Assets/Scripts/Player.cs")).toBe("Assets.Scripts");
    expect(modulePathFor("Program.cs")).toBe("");
  });

  it("uses the first directory as the module", () => {
    expect(moduleFor("Assets/Scripts/Player.cs")).toBe("Assets");
    expect(moduleFor("Program.cs")).toBe(ROOT_MODULE);
  });
});

describe("categorize", () => {
  it("matches module prefixes case-insensitively", () => {
    expect(categorize("GameCore/Player.cs", "GameCore", RULES)).toBe("Gameplay");
    expect(categorize("gameplay/Enemy.cs", "gameplay", RULES)).toBe("Gameplay");
  });

  it("matches glob patterns against the path", () => {
    expect(categorize("Core/PlayerTests.cs", "Core", RULES)).toBe("Tests");
  });

  it("matches path prefixes when the pattern has a slash", () => {
    expect(categorize("assets/ui/Menu.cs", "assets", RULES)).toBe("UI");
  });

  it("takes the first matching rule", () => {
    expect(categorize("Game/GameTests.cs", "Game", RULES)).toBe("Gameplay");
  });

  it("falls back to the default category", () => {
    expect(categorize("Program.cs", ROOT_MODULE, RULES)).toBe(DEFAULT_CATEGORY);
    expect(categorize("Core/Player.cs", "Core", [])).toBe(DEFAULT_CATEGORY);
  });
});

describe("classifyFile", () => {
  it("derives module path, module and category together", () => {
    expect(classifyFile("GameCore/Systems/Spawner.cs", RULES)).toEqual({
      modulePath: "GameCore.Systems",
      module: "GameCore",
      category: "Gameplay",
    });
  });
});
