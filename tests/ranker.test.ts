import { describe, it, expect } from "vitest";
import { computeBoost, computePageRank, rankSymbols, ruleMatches } from "../src/ranker.js";
import { SymbolTable } from "../src/symbolTable.js";
import type { BoostRule, ReferenceGraph } from "../src/types.js";
import { makeTable } from "./helpers.js";

function sumOf(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0);
}

describe("computePageRank", () => {
  it("returns immediately for an empty table", () => {
    const result = rankSymbols(new SymbolTable([]), { edges: [], unresolved: 0 });
    expect(result).toEqual({ ranked: [], converged: true, iterations: 0 });
  });

  it("keeps total mass at 1 with a sink", () => {
    const graph: ReferenceGraph = {
      edges: [{ from: 0, to: 1, kind: "calls", multiplicity: 1 }],
      unresolved: 0,
    };
    const { scores, converged } = computePageRank(2, graph, {
      dampingFactor: 0.85,
      maxIterations: 100,
      tolerance: 1e-6,
    });

    expect(converged).toBe(true);
    expect(sumOf([...scores])).toBeCloseTo(1, 6);
    // fixed point: a = 0.075 + 0.425 * b, a + b = 1
    expect(scores[0]).toBeCloseTo(0.5 / 1.425, 5);
    expect(scores[1]).toBeCloseTo(1 - 0.5 / 1.425, 5);
  });

  it("flags a run that hits the iteration cap", () => {
    const graph: ReferenceGraph = {
      edges: [{ from: 0, to: 1, kind: "calls", multiplicity: 1 }],
      unresolved: 0,
    };
    const { scores, converged, iterations } = computePageRank(2, graph, {
      dampingFactor: 0.85,
      maxIterations: 1,
      tolerance: 1e-6,
    });

    expect(converged).toBe(false);
    expect(iterations).toBe(1);
    expect(scores[0]).toBeCloseTo(0.2875, 10);
    expect(scores[1]).toBeCloseTo(0.7125, 10);
  });

  it("weights out-edges by multiplicity", () => {
    const graph: ReferenceGraph = {
      edges: [
        { from: 0, to: 1, kind: "calls", multiplicity: 3 },
        { from: 0, to: 2, kind: "calls", multiplicity: 1 },
      ],
      unresolved: 0,
    };
    const { scores } = computePageRank(3, graph, {
      dampingFactor: 0.85,
      maxIterations: 100,
      tolerance: 1e-6,
    });

    expect(scores[1]).toBeGreaterThan(scores[2]);
    expect(scores[2]).toBeGreaterThan(scores[0]);
    expect(sumOf([...scores])).toBeCloseTo(1, 6);
  });
});

describe("rankSymbols", () => {
  it("orders by score, then id", () => {
    const table = makeTable([{ name: "Beta" }, { name: "Alpha" }, { name: "Gamma" }]);
    const result = rankSymbols(table, {
      edges: [{ from: 0, to: 2, kind: "uses", multiplicity: 1 }],
      unresolved: 0,
    });

    expect(result.ranked.map((r) => [r.id, r.rank])).toEqual([
      ["Gamma#class", 1],
      ["Alpha#class", 2],
      ["Beta#class", 3],
    ]);
    expect(result.ranked[1].score).toBeCloseTo(result.ranked[2].score, 12);
    expect(sumOf(result.ranked.map((r) => r.score))).toBeCloseTo(1, 6);
  });

  it("converges in one step without edges", () => {
    const table = makeTable([{ name: "A" }, { name: "B" }]);
    const result = rankSymbols(table, { edges: [], unresolved: 0 });

    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(1);
    expect(result.ranked[0].score).toBeCloseTo(0.5, 12);
    expect(result.ranked[1].score).toBeCloseTo(0.5, 12);
  });

  it("boosts matching names and renormalizes", () => {
    const table = makeTable([{ name: "GameManager" }, { name: "Player" }, { name: "Enemy" }]);
    const rules: BoostRule[] = [{ match: "suffix", pattern: "Manager", boost: 1.5 }];
    const plain = rankSymbols(table, { edges: [], unresolved: 0 });
    const boosted = rankSymbols(table, { edges: [], unresolved: 0 }, { boostRules: rules });

    const before = plain.ranked.find((r) => r.id === "GameManager#class");
    const after = boosted.ranked.find((r) => r.id === "GameManager#class");
    expect(computeBoost("GameManager", rules)).toBe(1.5);
    expect(before?.score).toBeCloseTo(1 / 3, 10);
    expect(after?.score).toBeCloseTo(3 / 7, 10);
    expect(after?.rank).toBe(1);
    expect(sumOf(boosted.ranked.map((r) => r.score))).toBeCloseTo(1, 10);
  });

  it("keeps scores finite when boosts multiply past the float range", () => {
    const table = makeTable([{ name: "Player" }, { name: "SGameManager" }]);
    const { ranked } = rankSymbols(table, { edges: [], unresolved: 0 }, {
      boostRules: [
        { match: "prefix", pattern: "S", boost: 1e200 },
        { match: "suffix", pattern: "Manager", boost: 1e200 },
      ],
    });

    expect(ranked.map((r) => r.id)).toEqual(["SGameManager#class", "Player#class"]);
    expect(ranked.every((r) => Number.isFinite(r.score))).toBe(true);
    expect(ranked[0].score).toBeCloseTo(1, 12);
    expect(sumOf(ranked.map((r) => r.score))).toBeCloseTo(1, 12);
  });

  it("rejects a boost that is not a finite positive number", () => {
    const table = makeTable([{ name: "Player" }]);
    expect(() =>
      rankSymbols(table, { edges: [], unresolved: 0 }, {
        boostRules: [{ match: "suffix", pattern: "er", boost: Infinity }],
      }),
    ).toThrow(RangeError);
  });

  it("never lowers a boosted symbol's standing as the boost grows", () => {
    const table = makeTable([{ name: "Player" }, { name: "Enemy" }, { name: "GameManager" }]);
    const graph: ReferenceGraph = {
      edges: [
        { from: 0, to: 1, kind: "calls", multiplicity: 2 },
        { from: 1, to: 0, kind: "calls", multiplicity: 1 },
      ],
      unresolved: 0,
    };

    let previousRank = Number.POSITIVE_INFINITY;
    let previousRatio = 0;
    for (const boost of [1, 1.5, 3, 10]) {
      const { ranked } = rankSymbols(table, graph, {
        boostRules: [{ match: "suffix", pattern: "Manager", boost }],
      });
      const manager = ranked.find((r) => r.id === "GameManager#class");
      const player = ranked.find((r) => r.id === "Player#class");
      const ratio = (manager?.score ?? 0) / (player?.score ?? 1);
      expect(manager?.rank ?? Infinity).toBeLessThanOrEqual(previousRank);
      expect(ratio).toBeGreaterThan(previousRatio);
      previousRank = manager?.rank ?? Infinity;
      previousRatio = ratio;
    }
  });
});

describe("boost rules", () => {
  it("requires an upper-case letter after a prefix", () => {
    const rule: BoostRule = { match: "prefix", pattern: "S", boost: 2 };
    expect(ruleMatches("SAudioService", rule)).toBe(true);
    expect(ruleMatches("Setup", rule)).toBe(false);
    expect(ruleMatches("S", rule)).toBe(false);
  });

  it("multiplies every matching rule", () => {
    const rules: BoostRule[] = [
      { match: "prefix", pattern: "S", boost: 3 },
      { match: "suffix", pattern: "Service", boost: 2 },
      { match: "contains", pattern: "Audio", boost: 1.25 },
      { match: "suffix", pattern: "Manager", boost: 5 },
    ];
    expect(computeBoost("SAudioService", rules)).toBe(7.5);
    expect(computeBoost("Player", rules)).toBe(1);
  });
});
