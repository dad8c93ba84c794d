import type { CountTokens } from "./types.js";

// Rough chars-per-token heuristic; callers can pass a real tokenizer.
export const estimateTokens: CountTokens = (text) => Math.ceil(text.length / 4);

/**
 * Greedy document under a token budget. Units are appended whole, and only
 * when the accumulated text plus the unit still fits. The first unit that
 * does not fit closes the document. The header is always kept.
 */
export class BudgetedDocument {
  private text: string;
  private closed = false;
  private accepted = 0;

  constructor(
    header: string,
    private readonly budget: number,
    private readonly countTokens: CountTokens = estimateTokens,
  ) {
    this.text = header;
  }

  tryAppend(unit: string): boolean {
    if (this.closed) return false;
    const candidate = this.text + unit;
    if (this.countTokens(candidate) > this.budget) {
      this.closed = true;
      return false;
    }
    this.text = candidate;
    this.accepted++;
    return true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get unitCount(): number {
    return this.accepted;
  }

  get tokens(): number {
    return this.countTokens(this.text);
  }

  toString(): string {
    return this.text;
  }
}
