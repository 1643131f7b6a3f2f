/**
 * Structuring Client
 *
 * Sends one verified record to the structuring service and turns the reply
 * into a StructuredQuestion whose answer matches the paper.
 *
 * Per call: pacing gate → completion → cost ledger → lenient JSON parse →
 * candidate schema → integrity check → assembly. Transient failures
 * (including unparseable replies) are retried by the RetryPolicy; permanent
 * ones end the record immediately. Nothing is thrown to the caller.
 */

import type { AICompletionResult, CompletionFn } from "@/lib/ai/client";
import { toServiceError, type AIErrorCode } from "@/lib/ai/error-utils";
import type { RetryPolicy } from "@/lib/ai/retry-policy";
import type { ExamInfoConfig } from "@/lib/config";
import { TransientServiceError, type ServiceError } from "@/lib/errors";
import type { VerifiedQuestionRecord } from "@/lib/extraction/types";
import type { RunLogger } from "@/lib/logger";
import { CostTracker } from "@/lib/metering/cost-tracker";
import { extractJsonObject, recoverBrokenJson } from "@/lib/utils/json-recovery";
import { candidateSchema, type StructuredQuestion, type StructuringCandidate } from "@/lib/validation/schemas";
import { assembleQuestion } from "./assemble";
import { enforceAnswerIntegrity, type IntegrityAnomaly } from "./integrity";
import { buildStructuringPrompt } from "./prompts";

export interface StructureError {
  number: number;
  /** INTERRUPTED: the run was aborted before the record finished; it stays pending */
  code: AIErrorCode | "INTERRUPTED";
  reason: string;
  attempts: number;
}

export type StructureOutcome =
  | { ok: true; question: StructuredQuestion; anomalies: IntegrityAnomaly[]; attempts: number }
  | { ok: false; error: StructureError };

export interface StructuringClient {
  structure(record: VerifiedQuestionRecord, signal?: AbortSignal): Promise<StructureOutcome>;
}

export interface AIStructuringClientOptions {
  complete: CompletionFn;
  exam: ExamInfoConfig;
  policy: RetryPolicy;
  costTracker: CostTracker;
  logger: RunLogger;
}

type AttemptResult =
  | { ok: true; question: StructuredQuestion; anomaly?: IntegrityAnomaly }
  | { ok: false; error: ServiceError };

/**
 * Parse a reply into a candidate.
 * @throws TransientServiceError (PARSE_ERROR) when no usable object is found
 */
export function parseCandidate(content: string): StructuringCandidate {
  if (extractJsonObject(content) === null) {
    throw new TransientServiceError("No JSON object in response", "PARSE_ERROR");
  }

  let parsed: unknown;
  try {
    parsed = recoverBrokenJson(content).parsed;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TransientServiceError(`Unparseable JSON in response: ${message}`, "PARSE_ERROR");
  }

  const result = candidateSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 3).map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new TransientServiceError(`Response does not match question schema: ${issues.join("; ")}`, "PARSE_ERROR");
  }
  return result.data;
}

export class AIStructuringClient implements StructuringClient {
  constructor(private readonly options: AIStructuringClientOptions) {}

  async structure(record: VerifiedQuestionRecord, signal?: AbortSignal): Promise<StructureOutcome> {
    const { policy, logger } = this.options;
    const stage = `structure:Q${record.number}`;
    let attempts = 0;
    let lastError: ServiceError | undefined;

    while (attempts < policy.maxAttempts) {
      await policy.pace(signal);
      if (signal?.aborted) return this.interrupted(record, attempts);

      attempts++;
      logger.debug("ai", stage, `Attempt ${attempts}/${policy.maxAttempts}`);
      const result = await this.attempt(record, signal);

      if (result.ok) {
        const anomalies = result.anomaly ? [result.anomaly] : [];
        for (const anomaly of anomalies) {
          logger.warn("ai", stage, anomaly.message, { ...anomaly });
        }
        return { ok: true, question: result.question, anomalies, attempts };
      }

      if (signal?.aborted) return this.interrupted(record, attempts);

      lastError = result.error;
      const retry = policy.shouldRetry(attempts, result.error.retryable);
      logger.warn("ai", stage, `Attempt ${attempts} failed (${result.error.code}): ${result.error.message}`, {
        code: result.error.code,
        retryable: result.error.retryable,
        willRetry: retry,
      });
      if (!retry) break;

      const delay = await policy.backoff(attempts, signal);
      logger.debug("ai", stage, `Waited ${delay}ms before retrying`);
      if (signal?.aborted) return this.interrupted(record, attempts);
    }

    return {
      ok: false,
      error: {
        number: record.number,
        code: lastError?.code ?? "UNKNOWN",
        reason: lastError?.message ?? "No attempts were made",
        attempts,
      },
    };
  }

  private async attempt(record: VerifiedQuestionRecord, signal?: AbortSignal): Promise<AttemptResult> {
    const { complete, exam, policy, costTracker, logger } = this.options;
    const { system, prompt } = buildStructuringPrompt(record, exam);
    const stage = `structure:Q${record.number}`;
    const started = policy.clock.now();

    let response: AICompletionResult;
    try {
      response = await complete({ system, prompt, signal });
    } catch (err) {
      policy.markCall();
      costTracker.recordCall(0, 0, false);
      return { ok: false, error: toServiceError(err) };
    }
    policy.markCall();

    const inputTokens = response.usage?.inputTokens ?? CostTracker.estimateTokensFromText(system + "\n" + prompt);
    const outputTokens = response.usage?.outputTokens ?? CostTracker.estimateTokensFromText(response.content);
    logger.logAI(stage, prompt, response.content, {
      usage: { inputTokens, outputTokens },
      durationMs: policy.clock.now() - started,
      model: response.model,
      stopReason: response.stopReason,
      usageEstimated: response.usage === undefined,
    });

    let candidate: StructuringCandidate;
    try {
      candidate = parseCandidate(response.content);
    } catch (err) {
      costTracker.recordCall(inputTokens, outputTokens, false);
      return { ok: false, error: toServiceError(err) };
    }
    costTracker.recordCall(inputTokens, outputTokens, true);

    const checked = enforceAnswerIntegrity(candidate, record);
    return {
      ok: true,
      question: assembleQuestion(checked.candidate, record, exam),
      anomaly: checked.anomaly,
    };
  }

  private interrupted(record: VerifiedQuestionRecord, attempts: number): StructureOutcome {
    return {
      ok: false,
      error: { number: record.number, code: "INTERRUPTED", reason: "Run interrupted", attempts },
    };
  }
}
