import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { batchSucceeded, runBatch } from "./batch";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config";
import { runQuery } from "./pipeline";
import type { RunState } from "./types";

interface RunCommandOptions {
  config: string;
  budget?: number;
  concurrency?: number;
  verbose?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed < 1) throw new InvalidArgumentError("Expected an integer >= 1.");
  return parsed;
}

function describeOutcome(state: RunState): string {
  const changes = `${state.changeLog.length} correction(s), ${state.changeLog.filter((e) => !e.noop).length} effective`;
  switch (state.terminal) {
    case "SUCCEEDED":
      return `SUCCEEDED after ${state.retryCount} retr${state.retryCount === 1 ? "y" : "ies"} (${changes})`;
    case "FAILED_BUDGET_EXCEEDED":
      return `FAILED_BUDGET_EXCEEDED at ${state.retryCount}/${state.retryBudget} (${changes})`;
    case "FAILED_UNCLASSIFIABLE":
      return `FAILED_UNCLASSIFIABLE in ${state.failure?.stage ?? "engine"}: ${state.failure?.message ?? "unknown error"}`;
    case null:
      return `CANCELLED before ${state.failure?.stage ?? "next stage"}`;
    default:
      return state.terminal;
  }
}

async function runCommand(queries: string[], options: RunCommandOptions): Promise<void> {
  const config = await loadConfig(options.config);
  const retryBudget = options.budget ?? config.retryBudget;
  const concurrency = options.concurrency ?? config.concurrency;

  const controller = new AbortController();
  const onSigint = () => {
    console.error("Cancelling after the current stage…");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const outcomes = await runBatch(queries, concurrency, async (query) => {
      const { state, reportPath } = await runQuery(query, config, {
        retryBudget,
        verbose: options.verbose,
        signal: controller.signal,
      });
      console.log(`${query}: ${describeOutcome(state)}`);
      if (state.storageHandle) console.log(`  files:  ${state.storageHandle}`);
      console.log(`  report: ${reportPath}`);
      if (state.terminal !== "SUCCEEDED" && state.validationLog) {
        console.log(state.validationLog.split("\n").slice(0, 20).map((line) => `  | ${line}`).join("\n"));
      }
      return state;
    });
    if (!batchSucceeded(outcomes)) process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name("hdl-autofix")
    .description("Generate Verilog with an LLM, simulate it with Icarus, and correct it until it passes");

  program
    .command("run")
    .description("Run the generate/validate/correct pipeline for one or more design requests")
    .argument("<queries...>", "design requests, e.g. \"2-input AND gate\"")
    .option("-c, --config <path>", "pipeline config file", DEFAULT_CONFIG_PATH)
    .option("-b, --budget <n>", "maximum correction cycles per run", parseNonNegativeInt)
    .option("--concurrency <n>", "runs executed at the same time", parsePositiveInt)
    .option("-v, --verbose", "echo pipeline events to stderr")
    .action(async (queries: string[], options: RunCommandOptions) => {
      await runCommand(queries, options);
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
