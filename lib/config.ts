/**
 * Centralized Configuration
 *
 * Single source of truth for all settings. The CLI calls loadConfig() once
 * with process.env and its flags; the resulting PipelineConfig is passed
 * explicitly into the extractor, the structuring client and the batch
 * driver. Nothing else in lib/ reads the environment.
 *
 * Usage:
 *   const config = loadConfig(process.env, { inputPath: "paper.pdf" });
 *   const driver = new BatchDriver({ config, ... });
 */

import path from "path";
import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";
import { defaultRatesFor } from "@/lib/metering/cost-config";

type Env = Record<string, string | undefined>;

// =============================================================================
// Helpers
// =============================================================================

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`Invalid integer for ${name}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function optionalFloat(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    console.warn(`Invalid float for ${name}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/** Delays are configured in seconds (RATE_LIMIT_DELAY=1.0) and used in ms. */
function optionalSeconds(env: Env, name: string, defaultSeconds: number): number {
  return Math.round(optionalFloat(env, name, defaultSeconds) * 1000);
}

// =============================================================================
// Defaults
// =============================================================================

export const AI_ENGINES = ["claude", "openai"] as const;
export type AIEngine = (typeof AI_ENGINES)[number];

export const DEFAULT_MODELS: Record<AIEngine, string> = {
  claude: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
};

const API_KEY_VARS: Record<AIEngine, string> = {
  claude: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

const MODEL_VARS: Record<AIEngine, string> = {
  claude: "CLAUDE_MODEL",
  openai: "OPENAI_MODEL",
};

/** Subject headers recognised as section boundaries in exam papers. */
export const KNOWN_SUBJECTS = ["Physics", "Chemistry", "Biology", "Botany", "Zoology", "Mathematics"];

export const DEFAULT_PLACEHOLDER_PATTERNS = [
  "placeholder",
  "text\\s+here",
  "option\\s+[A-D]\\s+text",
  "sample.*question",
  "analysis\\s+not\\s+provided",
  "chapter\\s+name\\s+here",
  "topic\\s+name\\s+here",
  "detailed\\s+explanation$",
];

// =============================================================================
// Schema
// =============================================================================

const pipelineConfigSchema = z.object({
  ai: z.object({
    engine: z.enum(AI_ENGINES),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
  retry: z.object({
    maxRetries: z.number().int().min(1),
    errorDelayMs: z.number().int().min(0),
    maxErrorDelayMs: z.number().int().min(0),
    rateLimitDelayMs: z.number().int().min(0),
    backoff: z.enum(["fixed", "exponential"]),
  }),
  batch: z.object({
    batchSize: z.number().int().positive(),
  }),
  paths: z.object({
    inputPath: z.string().min(1).optional(),
    outputPath: z.string().min(1),
    workDir: z.string().min(1),
    batchesDir: z.string().min(1),
    logsDir: z.string().min(1),
    progressFile: z.string().min(1),
    failedLog: z.string().min(1),
  }),
  exam: z.object({
    examType: z.string().min(1),
    year: z.number().int().min(1988).max(2100),
    subject: z.string().min(1),
    paperCode: z.string().min(1),
  }),
  extraction: z.object({
    sectionStartMarkers: z.array(z.string().min(1)),
    sectionEndMarkers: z.array(z.string().min(1)),
  }),
  validation: z.object({
    minQuestionLength: z.number().int().min(0),
    minConceptTags: z.number().int().min(0),
    minSolutionSteps: z.number().int().min(0),
    placeholderPatterns: z.array(z.string().min(1)),
  }),
  costs: z.object({
    inputPerMillion: z.number().min(0),
    outputPerMillion: z.number().min(0),
  }),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type AIConfig = PipelineConfig["ai"];
export type RetryConfig = PipelineConfig["retry"];
export type ExamInfoConfig = PipelineConfig["exam"];
export type ValidationRules = PipelineConfig["validation"];

/** Values that come from CLI flags and beat the environment. */
export interface ConfigOverrides {
  inputPath?: string;
  outputPath?: string;
  workDir?: string;
  batchSize?: number;
  engine?: string;
  model?: string;
}

export interface LoadConfigOptions {
  /** False for dry runs: no call is made, so no key is needed. */
  requireCredentials?: boolean;
}

// =============================================================================
// Loading
// =============================================================================

/** Header markers for a subject: its own name starts the section, any other subject ends it. */
export function sectionMarkersFor(subject: string): { start: string[]; end: string[] } {
  const own = subject.trim();
  return {
    start: [`\\b${own}\\b`],
    end: KNOWN_SUBJECTS.filter((s) => s.toLowerCase() !== own.toLowerCase()).map((s) => `\\b${s}\\b`),
  };
}

/**
 * Build and validate the pipeline configuration.
 *
 * @throws ConfigurationError when a value is invalid or a required credential is missing
 */
export function loadConfig(
  env: Env,
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): PipelineConfig {
  const { requireCredentials = true } = options;

  const engine = overrides.engine ?? optional(env, "AI_ENGINE", "claude");
  if (!isEngine(engine)) {
    throw new ConfigurationError(`Unknown AI engine "${engine}". Expected one of: ${AI_ENGINES.join(", ")}`);
  }

  const apiKey = env[API_KEY_VARS[engine]] || undefined;
  if (requireCredentials && !apiKey) {
    throw new ConfigurationError(
      `Missing required environment variable: ${API_KEY_VARS[engine]}\n` +
        `See .env.example for configuration options.`,
    );
  }

  const workDir = path.resolve(overrides.workDir ?? optional(env, "WORK_DIR", "./output"));
  const inputPath = overrides.inputPath ?? env.PDF_PATH;
  const year = optionalInt(env, "EXAM_YEAR", 2024);
  const subject = optional(env, "EXAM_SUBJECT", "Physics");
  const markers = sectionMarkersFor(subject);
  const rates = defaultRatesFor(engine);

  const candidate = {
    ai: {
      engine,
      apiKey,
      baseUrl: env.AI_BASE_URL || undefined,
      model: overrides.model ?? optional(env, MODEL_VARS[engine], DEFAULT_MODELS[engine]),
      temperature: optionalFloat(env, "TEMPERATURE", 0),
      maxTokens: optionalInt(env, "MAX_TOKENS", 4000),
      timeoutMs: optionalInt(env, "AI_TIMEOUT_MS", 90_000),
    },
    retry: {
      maxRetries: optionalInt(env, "MAX_RETRIES", 5),
      errorDelayMs: optionalSeconds(env, "ERROR_DELAY", 5.0),
      maxErrorDelayMs: optionalSeconds(env, "MAX_ERROR_DELAY", 60),
      rateLimitDelayMs: optionalSeconds(env, "RATE_LIMIT_DELAY", 1.0),
      backoff: optional(env, "RETRY_BACKOFF", "exponential"),
    },
    batch: {
      batchSize: overrides.batchSize ?? optionalInt(env, "BATCH_SIZE", 10),
    },
    paths: {
      inputPath: inputPath ? path.resolve(inputPath) : undefined,
      outputPath: path.resolve(overrides.outputPath ?? optional(env, "OUTPUT_PATH", path.join(workDir, "questions.json"))),
      workDir,
      batchesDir: path.join(workDir, "batches"),
      logsDir: path.join(workDir, "logs"),
      progressFile: path.join(workDir, "progress.json"),
      failedLog: path.join(workDir, "failed_questions.log"),
    },
    exam: {
      examType: optional(env, "EXAM_TYPE", "NEET"),
      year,
      subject,
      paperCode: optional(env, "PAPER_CODE", `${year}-${subject.slice(0, 3).toUpperCase()}`),
    },
    extraction: {
      sectionStartMarkers: markers.start,
      sectionEndMarkers: markers.end,
    },
    validation: {
      minQuestionLength: optionalInt(env, "MIN_QUESTION_LENGTH", 50),
      minConceptTags: 2,
      minSolutionSteps: 2,
      placeholderPatterns: DEFAULT_PLACEHOLDER_PATTERNS,
    },
    costs: {
      inputPerMillion: optionalFloat(env, "COST_INPUT_PER_MTOK", rates.inputPerMillion),
      outputPerMillion: optionalFloat(env, "COST_OUTPUT_PER_MTOK", rates.outputPerMillion),
    },
  };

  const parsed = pipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

function isEngine(value: string): value is AIEngine {
  return AI_ENGINES.some((e) => e === value);
}
