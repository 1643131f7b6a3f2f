/**
 * Run Logger - Structured logging for one pipeline run
 *
 * Logs are written to: <workDir>/logs/run-<timestamp>.jsonl (one JSON object per line)
 * and echoed to the console as "[stage] message".
 *
 * Log types:
 *   - ai: structuring service calls and responses
 *   - pipeline: extraction, validation, batches, progress
 *   - system: startup, configuration, shutdown
 *
 * Usage:
 *   const logger = createRunLogger({ logDir: config.paths.logsDir });
 *   logger.info("pipeline", "batch.saved", "Saved batch 3", { count: 10 });
 *   logger.logAI("structure:Q12", prompt, response, { usage });
 */

import { appendFileSync, mkdirSync } from "fs";
import { join } from "path";

// =====================================================
// TYPES
// =====================================================

export type LogType = "ai" | "pipeline" | "system";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  type: LogType;
  level: LogLevel;
  stage: string;
  message?: string;
  // AI-specific fields
  promptLength?: number;
  promptPreview?: string;
  responseLength?: number;
  responsePreview?: string;
  usage?: { inputTokens?: number; outputTokens?: number };
  durationMs?: number;
  // General metadata
  metadata?: Record<string, unknown>;
}

export interface AILogOptions {
  usage?: { inputTokens?: number; outputTokens?: number };
  durationMs?: number;
  [key: string]: unknown;
}

export interface RunLogger {
  debug(type: LogType, stage: string, message: string, metadata?: Record<string, unknown>): void;
  info(type: LogType, stage: string, message: string, metadata?: Record<string, unknown>): void;
  warn(type: LogType, stage: string, message: string, metadata?: Record<string, unknown>): void;
  error(type: LogType, stage: string, message: string, metadata?: Record<string, unknown>): void;
  /** Record an AI call with prompt/response previews. File only, never echoed. */
  logAI(stage: string, prompt: string, response: string, options?: AILogOptions): void;
  /** Print a line for the operator without a stage prefix (progress lines, summaries). */
  print(line: string): void;
  getFilePath(): string | undefined;
}

export interface RunLoggerOptions {
  logDir: string;
  /** Defaults to the ISO timestamp with separators removed. */
  runId?: string;
  /** Echo to the console (default: true) */
  echo?: boolean;
  /** Include debug entries in the console echo (default: false) */
  verbose?: boolean;
  /** Write the JSONL file (default: true). Dry runs echo only. */
  persist?: boolean;
}

// =====================================================
// FILE LOGGER
// =====================================================

export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const { logDir, echo = true, verbose = false, persist = true } = options;
  const runId = options.runId ?? new Date().toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  const filePath = join(logDir, `run-${runId}.jsonl`);

  let writable = persist;
  if (persist) {
    try {
      mkdirSync(logDir, { recursive: true });
    } catch (error) {
      writable = false;
      console.error(`[Logger] Cannot create log directory ${logDir}:`, error);
    }
  }

  function write(entry: LogEntry): void {
    if (!writable) return;
    try {
      appendFileSync(filePath, JSON.stringify(entry) + "\n");
    } catch (error) {
      console.error("[Logger] Failed to write log:", error);
    }
  }

  function emit(level: LogLevel, type: LogType, stage: string, message: string, metadata?: Record<string, unknown>): void {
    write({ timestamp: new Date().toISOString(), type, level, stage, message, metadata });
    if (!echo || (level === "debug" && !verbose)) return;
    const line = `[${stage}] ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  return {
    debug: (type, stage, message, metadata) => emit("debug", type, stage, message, metadata),
    info: (type, stage, message, metadata) => emit("info", type, stage, message, metadata),
    warn: (type, stage, message, metadata) => emit("warn", type, stage, message, metadata),
    error: (type, stage, message, metadata) => emit("error", type, stage, message, metadata),
    logAI(stage, prompt, response, aiOptions) {
      write(aiEntry(stage, prompt, response, aiOptions));
    },
    print(line) {
      if (echo) console.log(line);
      write({ timestamp: new Date().toISOString(), type: "pipeline", level: "info", stage: "report", message: line });
    },
    getFilePath: () => (writable ? filePath : undefined),
  };
}

// =====================================================
// MEMORY LOGGER
// =====================================================

export type MemoryLogger = RunLogger & { getLogs(): LogEntry[] };

/** In-memory collector with the same surface, for tests and dry runs without a work dir. */
export function createMemoryLogger(): MemoryLogger {
  const logs: LogEntry[] = [];
  const push = (level: LogLevel, type: LogType, stage: string, message: string, metadata?: Record<string, unknown>) => {
    logs.push({ timestamp: new Date().toISOString(), type, level, stage, message, metadata });
  };

  return {
    debug: (type, stage, message, metadata) => push("debug", type, stage, message, metadata),
    info: (type, stage, message, metadata) => push("info", type, stage, message, metadata),
    warn: (type, stage, message, metadata) => push("warn", type, stage, message, metadata),
    error: (type, stage, message, metadata) => push("error", type, stage, message, metadata),
    logAI: (stage, prompt, response, options) => {
      logs.push(aiEntry(stage, prompt, response, options));
    },
    print: (line) => push("info", "pipeline", "report", line),
    getFilePath: () => undefined,
    getLogs: () => logs,
  };
}

// =====================================================
// UTILITIES
// =====================================================

function aiEntry(stage: string, prompt: string, response: string, options?: AILogOptions): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    type: "ai",
    level: "info",
    stage,
    promptLength: prompt.length,
    promptPreview: prompt.slice(0, 1000),
    responseLength: response.length,
    responsePreview: response.slice(0, 500),
    usage: options?.usage,
    durationMs: options?.durationMs,
    metadata: options,
  };
}
