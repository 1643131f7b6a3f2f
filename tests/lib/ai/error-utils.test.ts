import { describe, it, expect } from "vitest";
import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { classifyAIError, hintForError, isRetryable, toServiceError } from "@/lib/ai/error-utils";
import { PermanentServiceError, TransientServiceError } from "@/lib/errors";

function httpError(status: number, message = "request failed"): Error & { status: number } {
  return Object.assign(new Error(message), { status });
}

describe("classifyAIError", () => {
  it.each([
    [429, "RATE_LIMIT"],
    [408, "TIMEOUT"],
    [401, "AUTH"],
    [403, "AUTH"],
    [402, "BILLING"],
    [404, "MODEL"],
    [400, "INVALID_REQUEST"],
    [422, "INVALID_REQUEST"],
    [500, "SERVER"],
    [529, "SERVER"],
  ])("classifies HTTP %i as %s", (status, code) => {
    expect(classifyAIError(httpError(status))).toBe(code);
  });

  it("prefers the status over the message", () => {
    expect(classifyAIError(httpError(503, "invalid api key"))).toBe("SERVER");
  });

  it.each([
    ["Request timed out.", "TIMEOUT"],
    ["Your credit balance is too low", "BILLING"],
    ["Invalid API key provided", "AUTH"],
    ["Rate limit exceeded", "RATE_LIMIT"],
    ["Overloaded", "SERVER"],
    ["model: claude-x not found", "MODEL"],
    ["connect ECONNREFUSED 127.0.0.1:443", "NETWORK"],
    ["Output blocked by content policy", "CONTENT_POLICY"],
    ["Unexpected token } in JSON at position 4", "PARSE_ERROR"],
    ["something odd", "UNKNOWN"],
  ])("classifies %j as %s", (message, code) => {
    expect(classifyAIError(new Error(message))).toBe(code);
  });

  it("treats non-errors as unknown", () => {
    expect(classifyAIError("boom")).toBe("UNKNOWN");
    expect(classifyAIError(null)).toBe("UNKNOWN");
  });

  it("treats dropped SDK connections as network errors", () => {
    expect(classifyAIError(new Anthropic.APIConnectionError({}))).toBe("NETWORK");
    expect(classifyAIError(new OpenAI.APIConnectionError({}))).toBe("NETWORK");
    expect(toServiceError(new Anthropic.APIConnectionError({})).retryable).toBe(true);
  });

  it("treats SDK connection timeouts as timeouts", () => {
    expect(classifyAIError(new Anthropic.APIConnectionTimeoutError())).toBe("TIMEOUT");
    expect(classifyAIError(new OpenAI.APIConnectionTimeoutError())).toBe("TIMEOUT");
  });

  it("recognises a connection error by its message", () => {
    expect(classifyAIError(new Error("Connection error."))).toBe("NETWORK");
  });

  it("keeps the code of a service error", () => {
    expect(classifyAIError(new TransientServiceError("bad reply", "PARSE_ERROR"))).toBe("PARSE_ERROR");
  });
});

describe("isRetryable", () => {
  it("retries transient codes only", () => {
    const transient = ["RATE_LIMIT", "TIMEOUT", "NETWORK", "SERVER", "PARSE_ERROR"] as const;
    expect(transient.every((code) => isRetryable(code))).toBe(true);
  });

  it.each(["AUTH", "BILLING", "INVALID_REQUEST", "CONTENT_POLICY", "MODEL", "UNKNOWN"] as const)("does not retry %s", (code) => {
    expect(isRetryable(code)).toBe(false);
  });
});

describe("toServiceError", () => {
  it("wraps transient failures", () => {
    const error = toServiceError(httpError(429, "slow down"));
    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error.code).toBe("RATE_LIMIT");
    expect(error.retryable).toBe(true);
    expect(error.message).toBe("slow down");
  });

  it("wraps permanent failures", () => {
    const error = toServiceError(httpError(401));
    expect(error).toBeInstanceOf(PermanentServiceError);
    expect(error.retryable).toBe(false);
  });

  it("returns service errors unchanged", () => {
    const original = new PermanentServiceError("nope", "BILLING");
    expect(toServiceError(original)).toBe(original);
  });

  it("has a hint for every code", () => {
    expect(hintForError("TIMEOUT")).toBe("The service took too long to respond. Consider raising AI_TIMEOUT_MS.");
  });
});
