/**
 * Cost Configuration for Usage Metering
 *
 * Default token prices per engine. Overridable per run through
 * COST_INPUT_PER_MTOK / COST_OUTPUT_PER_MTOK (see lib/config.ts).
 *
 * Rates are USD per million tokens.
 */

import type { AIEngine } from "@/lib/config";

export interface TokenRates {
  inputPerMillion: number;
  outputPerMillion: number;
  description: string;
}

// Based on provider list pricing as of 2025
export const DEFAULT_COST_RATES: Record<AIEngine, TokenRates> = {
  // Claude Sonnet: ~$3/M input, ~$15/M output
  claude: {
    inputPerMillion: 3,
    outputPerMillion: 15,
    description: "Claude Sonnet tokens (~$3/M in, ~$15/M out)",
  },
  // OpenAI GPT-4o: ~$2.5/M input, ~$10/M output
  openai: {
    inputPerMillion: 2.5,
    outputPerMillion: 10,
    description: "OpenAI GPT-4o tokens (~$2.5/M in, ~$10/M out)",
  },
};

/** Thresholds (USD) at which the run summary prints a cost warning. */
export const COST_WARNING_THRESHOLDS = {
  high: 5,
  critical: 10,
} as const;

export function defaultRatesFor(engine: AIEngine): TokenRates {
  return DEFAULT_COST_RATES[engine];
}

/**
 * Calculate cost in USD for a token count at a per-million rate.
 */
export function calculateCost(tokens: number, perMillion: number): number {
  return (tokens * perMillion) / 1_000_000;
}
