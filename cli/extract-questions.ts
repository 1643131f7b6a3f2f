#!/usr/bin/env -S npx tsx
/**
 * Exam Question Extraction CLI
 *
 * Extracts the questions of one subject from an exam paper, structures
 * them in resumable batches and writes a single question document.
 *
 * Usage:
 *   npx tsx cli/extract-questions.ts --pdf paper.pdf [options]
 *   npm run extract -- --text paper.txt --dry-run
 *
 * Exit codes: 0 on completion (also after a flushed interrupt), 1 on a
 * configuration or startup failure.
 */

import { Command, InvalidArgumentError } from "commander";
import { access, readFile } from "fs/promises";
import { createCompletionFn } from "@/lib/ai/client";
import { RetryPolicy } from "@/lib/ai/retry-policy";
import { loadConfig, type ConfigOverrides } from "@/lib/config";
import { ConfigurationError, ProgressStateError, errorMessage } from "@/lib/errors";
import { loadDocumentText, splitTextPages } from "@/lib/extraction/pdf-text";
import { createRunLogger } from "@/lib/logger";
import { CostTracker } from "@/lib/metering/cost-tracker";
import { BatchDriver } from "@/lib/pipeline/batch-driver";
import { AIStructuringClient } from "@/lib/structuring/structuring-client";

type CliOptions = {
  pdf?: string;
  text?: string;
  output?: string;
  batchSize?: number;
  resume?: boolean;
  dryRun?: boolean;
  startQuestion?: number;
  endQuestion?: number;
  engine?: string;
  model?: string;
  workDir?: string;
  verbose?: boolean;
};

const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

function error(message: string) {
  console.error(`${colors.red}❌ ${message}${colors.reset}`);
}

function warn(message: string) {
  console.warn(`${colors.yellow}⚠️  ${message}${colors.reset}`);
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function buildProgram(): Command {
  return new Command()
    .name("extract-questions")
    .description("Extract, structure and validate exam questions in resumable batches")
    .option("--pdf <path>", "Exam paper PDF (or PDF_PATH)")
    .option("--text <path>", "Already-extracted text, pages separated by form feeds")
    .option("--output <path>", "Final question document (default: <work-dir>/questions.json)")
    .option("--batch-size <n>", "Questions per batch file", positiveInt)
    .option("--resume", "Skip questions already completed in progress.json (default)")
    .option("--no-resume", "Process every selected question again")
    .option("--dry-run", "Extract and validate only; no service calls, no files written")
    .option("--start-question <n>", "First question number to process", positiveInt)
    .option("--end-question <n>", "Last question number to process", positiveInt)
    .option("--engine <engine>", "Structuring engine: claude | openai")
    .option("--model <id>", "Model id for the engine")
    .option("--work-dir <dir>", "Directory for batches, progress and logs (default: ./output)")
    .option("-v, --verbose", "Echo debug log entries");
}

async function readInput(options: CliOptions, inputPath: string | undefined): Promise<string[]> {
  const filePath = options.text ?? inputPath;
  if (!filePath) {
    throw new ConfigurationError("No input document. Pass --pdf or --text, or set PDF_PATH.");
  }
  try {
    await access(filePath);
  } catch {
    throw new ConfigurationError(`Input file not found: ${filePath}`);
  }

  if (options.text) {
    return splitTextPages(await readFile(filePath, "utf-8"));
  }
  return (await loadDocumentText(filePath)).pages;
}

async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const dryRun = options.dryRun ?? false;

  try {
    if (options.startQuestion && options.endQuestion && options.startQuestion > options.endQuestion) {
      throw new ConfigurationError("--start-question must not be greater than --end-question");
    }

    const overrides: ConfigOverrides = {
      inputPath: options.pdf,
      outputPath: options.output,
      workDir: options.workDir,
      batchSize: options.batchSize,
      engine: options.engine,
      model: options.model,
    };
    const config = loadConfig(process.env, overrides, { requireCredentials: !dryRun });
    const pages = await readInput(options, config.paths.inputPath);

    const logger = createRunLogger({
      logDir: config.paths.logsDir,
      verbose: options.verbose ?? false,
      persist: !dryRun,
    });
    logger.info("system", "startup", `Engine ${config.ai.engine} (${config.ai.model}), batch size ${config.batch.batchSize}`, {
      workDir: config.paths.workDir,
      dryRun,
    });

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      if (controller.signal.aborted) {
        warn(`${signal} received again, exiting without flushing`);
        process.exit(1);
      }
      warn(`${signal} received, finishing the current record and saving progress...`);
      controller.abort();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    const costTracker = new CostTracker(config.costs);
    const client = dryRun
      ? undefined
      : new AIStructuringClient({
          complete: createCompletionFn(config.ai),
          exam: config.exam,
          policy: new RetryPolicy(config.retry),
          costTracker,
          logger,
        });

    const driver = new BatchDriver({ config, client, costTracker, logger, signal: controller.signal });
    try {
      const report = await driver.run(pages, {
        resume: options.resume ?? true,
        dryRun,
        startQuestion: options.startQuestion,
        endQuestion: options.endQuestion,
      });

      if (report.extracted === 0) {
        error(`No ${config.exam.subject} questions could be extracted from the input`);
        return 1;
      }
      return 0;
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      error(`Configuration error: ${err.message}`);
    } else if (err instanceof ProgressStateError) {
      error(`${err.message} (${err.filePath}). Fix or remove the file, or run with --no-resume.`);
    } else {
      error(`Run failed: ${errorMessage(err)}`);
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    error(errorMessage(err));
    process.exitCode = 1;
  },
);
