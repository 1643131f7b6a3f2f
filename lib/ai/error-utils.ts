/**
 * Shared AI Error Classification
 *
 * Maps SDK/transport errors onto a small set of codes and decides which
 * of them are worth another attempt. HTTP status (when the SDK exposes
 * one) wins over message sniffing.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { PermanentServiceError, ServiceError, TransientServiceError } from "@/lib/errors";

export type AIErrorCode =
  | "RATE_LIMIT"
  | "TIMEOUT"
  | "NETWORK"
  | "SERVER"
  | "PARSE_ERROR"
  | "AUTH"
  | "BILLING"
  | "INVALID_REQUEST"
  | "CONTENT_POLICY"
  | "MODEL"
  | "UNKNOWN";

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function classifyStatus(status: number): AIErrorCode | undefined {
  if (status === 429) return "RATE_LIMIT";
  if (status === 408) return "TIMEOUT";
  if (status === 401 || status === 403) return "AUTH";
  if (status === 402) return "BILLING";
  if (status === 404) return "MODEL";
  if (status === 400 || status === 413 || status === 422) return "INVALID_REQUEST";
  // 529 is Anthropic's "overloaded"
  if (status >= 500) return "SERVER";
  return undefined;
}

/**
 * Classify an error into a standardized error code.
 * Checks HTTP status first, then error message patterns and error types.
 */
export function classifyAIError(error: unknown): AIErrorCode {
  if (error instanceof ServiceError) {
    return error.code;
  }

  // SDK connection errors carry no status; the timeout variant subclasses the connection one
  if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof OpenAI.APIConnectionTimeoutError) {
    return "TIMEOUT";
  }
  if (error instanceof Anthropic.APIConnectionError || error instanceof OpenAI.APIConnectionError) {
    return "NETWORK";
  }

  const status = statusOf(error);
  if (status !== undefined) {
    const byStatus = classifyStatus(status);
    if (byStatus) return byStatus;
  }

  if (!(error instanceof Error)) {
    return "UNKNOWN";
  }

  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  // Timeout detection
  if (name === "aborterror" || name.includes("timeout") || message.includes("timeout") || message.includes("timed out")) {
    return "TIMEOUT";
  }

  // Billing
  if (message.includes("credit balance")) {
    return "BILLING";
  }

  // Authentication
  if (
    message.includes("api key") ||
    message.includes("authentication") ||
    message.includes("unauthorized") ||
    message.includes("forbidden")
  ) {
    return "AUTH";
  }

  // Rate limiting
  if (message.includes("rate limit") || message.includes("too many requests") || message.includes("429")) {
    return "RATE_LIMIT";
  }

  if (message.includes("overloaded") || message.includes("internal server error") || message.includes("bad gateway")) {
    return "SERVER";
  }

  // Model errors
  if (message.includes("model") && (message.includes("not found") || message.includes("does not exist"))) {
    return "MODEL";
  }

  // Network errors
  if (
    name.includes("connection") ||
    message.includes("network") ||
    message.includes("connection error") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("enotfound") ||
    message.includes("eaddrnotavail") ||
    message.includes("socket hang up") ||
    message.includes("unreachable")
  ) {
    return "NETWORK";
  }

  // Content policy
  if (message.includes("content policy") || message.includes("safety")) {
    return "CONTENT_POLICY";
  }

  // JSON parse errors
  if (
    name === "syntaxerror" ||
    message.includes("json") ||
    message.includes("unexpected token")
  ) {
    return "PARSE_ERROR";
  }

  return "UNKNOWN";
}

/**
 * Determine if an error is retryable.
 * A response we could not parse is worth another attempt: sampling may
 * produce a well-formed object next time.
 */
export function isRetryable(code: AIErrorCode): boolean {
  switch (code) {
    case "RATE_LIMIT":
    case "TIMEOUT":
    case "NETWORK":
    case "SERVER":
    case "PARSE_ERROR":
      return true;
    case "AUTH":
    case "BILLING":
    case "INVALID_REQUEST":
    case "CONTENT_POLICY":
    case "MODEL":
    case "UNKNOWN":
    default:
      return false;
  }
}

/** Wrap anything thrown by a transport call into the pipeline's service error types. */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;
  const code = classifyAIError(error);
  const message = error instanceof Error ? error.message : String(error);
  return isRetryable(code)
    ? new TransientServiceError(message, code)
    : new PermanentServiceError(message, code);
}

/** Short operator-facing hint for a failure code, used in the run summary. */
export function hintForError(code: AIErrorCode): string {
  switch (code) {
    case "RATE_LIMIT":
      return "The service is rate limiting requests. Increase RATE_LIMIT_DELAY or ERROR_DELAY.";
    case "TIMEOUT":
      return "The service took too long to respond. Consider raising AI_TIMEOUT_MS.";
    case "AUTH":
      return "Authentication failed. Check the API key.";
    case "BILLING":
      return "The provider account has a billing problem.";
    case "MODEL":
      return "The configured model is not available.";
    case "PARSE_ERROR":
      return "The service returned malformed JSON.";
    case "NETWORK":
      return "Network error connecting to the service.";
    case "SERVER":
      return "The service reported a server-side error.";
    case "INVALID_REQUEST":
      return "The service rejected the request as malformed.";
    case "CONTENT_POLICY":
      return "The request was blocked by the provider's safety filters.";
    case "UNKNOWN":
    default:
      return "Unexpected error while calling the service.";
  }
}
