import type {
  BoostRule,
  RankResult,
  RankedSymbol,
  ReferenceGraph,
} from "./types.js";
import type { SymbolTable } from "./symbolTable.js";

export type RankOptions = {
  dampingFactor: number;
  maxIterations: number;
  tolerance: number;
  boostRules: BoostRule[];
};

export const DEFAULT_RANK_OPTIONS: RankOptions = {
  dampingFactor: 0.85,
  maxIterations: 100,
  tolerance: 1e-6,
  boostRules: [],
};

function isUpperCase(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

export function ruleMatches(name: string, rule: BoostRule): boolean {
  switch (rule.match) {
    case "prefix": {
      // "S" matches SAudioService, not Setup
      if (!name.startsWith(rule.pattern)) return false;
      const next = name.charAt(rule.pattern.length);
      return next !== "" && isUpperCase(next);
    }
    case "suffix":
      return name.endsWith(rule.pattern);
    case "contains":
      return name.includes(rule.pattern);
  }
}

export function computeBoost(name: string, rules: readonly BoostRule[]): number {
  let factor = 1;
  for (const rule of rules) {
    if (ruleMatches(name, rule)) factor *= rule.boost;
  }
  return factor;
}

type Transitions = {
  outWeight: Float64Array;
  incoming: Array<Array<{ from: number; weight: number }>>;
};

function buildTransitions(size: number, graph: ReferenceGraph): Transitions {
  const outWeight = new Float64Array(size);
  const incoming: Transitions["incoming"] = Array.from({ length: size }, () => []);
  for (const edge of graph.edges) {
    outWeight[edge.from] += edge.multiplicity;
    incoming[edge.to].push({ from: edge.from, weight: edge.multiplicity });
  }
  return { outWeight, incoming };
}

/**
 * PageRank over the reference graph: a symbol's score flows to the symbols
 * it references, in proportion to edge multiplicity. Sinks spread their mass
 * over every symbol so the vector keeps summing to 1.
 */
export function computePageRank(
  size: number,
  graph: ReferenceGraph,
  options: Pick<RankOptions, "dampingFactor" | "maxIterations" | "tolerance">,
): { scores: Float64Array; converged: boolean; iterations: number } {
  if (size === 0) {
    return { scores: new Float64Array(0), converged: true, iterations: 0 };
  }

  const { outWeight, incoming } = buildTransitions(size, graph);
  const d = options.dampingFactor;
  let scores = new Float64Array(size).fill(1 / size);
  let converged = false;
  let iterations = 0;

  while (iterations < options.maxIterations) {
    iterations++;

    let sinkMass = 0;
    for (let i = 0; i < size; i++) {
      if (outWeight[i] === 0) sinkMass += scores[i];
    }
    const base = (1 - d) / size + (d * sinkMass) / size;

    const next = new Float64Array(size);
    let delta = 0;
    for (let i = 0; i < size; i++) {
      let inflow = 0;
      for (const { from, weight } of incoming[i]) {
        inflow += (scores[from] * weight) / outWeight[from];
      }
      next[i] = base + d * inflow;
      delta += Math.abs(next[i] - scores[i]);
    }

    scores = next;
    if (delta < options.tolerance) {
      converged = true;
      break;
    }
  }

  return { scores, converged, iterations };
}

// Products are summed as logs and shifted so the largest factor is exactly 1.
function boostFactors(table: SymbolTable, rules: readonly BoostRule[]): Float64Array {
  for (const rule of rules) {
    if (!Number.isFinite(rule.boost) || rule.boost <= 0) {
      throw new RangeError(`Boost for "${rule.pattern}" must be a finite positive number`);
    }
  }
  const factors = new Float64Array(table.size);
  let max = Number.NEGATIVE_INFINITY;
  for (const sym of table.all()) {
    let log = 0;
    for (const rule of rules) {
      if (ruleMatches(sym.name, rule)) log += Math.log(rule.boost);
    }
    factors[sym.index] = log;
    if (log > max) max = log;
  }
  for (let i = 0; i < factors.length; i++) factors[i] = Math.exp(factors[i] - max);
  return factors;
}

function normalize(values: Float64Array): void {
  let total = 0;
  for (const value of values) total += value;
  if (total <= 0) return;
  for (let i = 0; i < values.length; i++) values[i] /= total;
}

export function rankSymbols(
  table: SymbolTable,
  graph: ReferenceGraph,
  options: Partial<RankOptions> = {},
): RankResult {
  const opts: RankOptions = { ...DEFAULT_RANK_OPTIONS, ...options };
  const { scores, converged, iterations } = computePageRank(table.size, graph, opts);

  if (opts.boostRules.length > 0) {
    const factors = boostFactors(table, opts.boostRules);
    for (let i = 0; i < scores.length; i++) scores[i] *= factors[i];
    normalize(scores);
  }

  const ranked: RankedSymbol[] = table.all().map((sym) => ({
    index: sym.index,
    id: sym.id,
    score: scores[sym.index],
    rank: 0,
  }));
  ranked.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  ranked.forEach((entry, position) => {
    entry.rank = position + 1;
  });

  return { ranked, converged, iterations };
}
