/**
 * Cost Tracker - Running token and spend totals for one run
 *
 * One instance is created by the driver and passed by reference to the
 * structuring client, which records every call after it returns. The
 * tracker only reports; deciding whether to stop on cost is the caller's
 * business.
 */

import { calculateCost, COST_WARNING_THRESHOLDS } from "./cost-config";

export interface CostLedger {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  inputTokens: number;
  outputTokens: number;
}

export interface CostEstimate {
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

export interface CostRates {
  inputPerMillion: number;
  outputPerMillion: number;
}

export interface CostSummary extends CostLedger, CostEstimate {
  totalTokens: number;
}

export class CostTracker {
  private readonly ledger: CostLedger = {
    totalCalls: 0,
    successfulCalls: 0,
    failedCalls: 0,
    inputTokens: 0,
    outputTokens: 0,
  };

  constructor(private readonly rates: CostRates) {}

  recordCall(inputTokens: number, outputTokens: number, succeeded: boolean): void {
    this.ledger.totalCalls += 1;
    this.ledger.inputTokens += Math.max(0, Math.round(inputTokens));
    this.ledger.outputTokens += Math.max(0, Math.round(outputTokens));
    if (succeeded) {
      this.ledger.successfulCalls += 1;
    } else {
      this.ledger.failedCalls += 1;
    }
  }

  estimate(): CostEstimate {
    const inputCost = calculateCost(this.ledger.inputTokens, this.rates.inputPerMillion);
    const outputCost = calculateCost(this.ledger.outputTokens, this.rates.outputPerMillion);
    return { inputCost, outputCost, totalCost: inputCost + outputCost };
  }

  snapshot(): CostLedger {
    return { ...this.ledger };
  }

  summary(): CostSummary {
    const estimate = this.estimate();
    return {
      ...this.ledger,
      totalTokens: this.ledger.inputTokens + this.ledger.outputTokens,
      inputCost: round4(estimate.inputCost),
      outputCost: round4(estimate.outputCost),
      totalCost: round4(estimate.totalCost),
    };
  }

  /** Multi-line block for the console and the run log. */
  formatSummary(): string[] {
    const s = this.summary();
    const lines = [
      "=".repeat(60),
      "API COST SUMMARY",
      "=".repeat(60),
      `Total API Calls:     ${s.totalCalls}`,
      `  Successful:        ${s.successfulCalls}`,
      `  Failed:            ${s.failedCalls}`,
      `Token Usage:`,
      `  Input tokens:      ${s.inputTokens.toLocaleString("en-US")}`,
      `  Output tokens:     ${s.outputTokens.toLocaleString("en-US")}`,
      `  Total tokens:      ${s.totalTokens.toLocaleString("en-US")}`,
      `Cost Estimate:`,
      `  Input cost:        $${s.inputCost.toFixed(4)}`,
      `  Output cost:       $${s.outputCost.toFixed(4)}`,
      `  Total cost:        $${s.totalCost.toFixed(4)}`,
      "=".repeat(60),
    ];
    if (s.totalCost > COST_WARNING_THRESHOLDS.critical) {
      lines.push(`WARNING: Estimated cost exceeds $${COST_WARNING_THRESHOLDS.critical.toFixed(2)}`);
    } else if (s.totalCost > COST_WARNING_THRESHOLDS.high) {
      lines.push("High cost detected. Consider using smaller batches.");
    }
    return lines;
  }

  /**
   * Rough token estimate for when the service omits usage.
   * ~1.3 tokens per whitespace-separated word.
   */
  static estimateTokensFromText(text: string): number {
    const words = text.split(/\s+/).filter(Boolean).length;
    return Math.floor(words * 1.3);
  }
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
