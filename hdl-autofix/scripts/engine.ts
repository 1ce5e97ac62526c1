import { randomUUID } from "node:crypto";
import { GraphRecursionError } from "@langchain/langgraph";
import { summarizeChangeLog } from "./changeLog";
import type { ClassifyOptions } from "./classifier";
import type { Collaborators } from "./collaborators/types";
import { errorMessage, PipelineError } from "./errors";
import { createPipelineGraph, stageInvocationCap } from "./graph";
import type { PipelineLogger } from "./logger";
import type { PipelineConfig, RunFailure, RunState } from "./types";

export const DEFAULT_TIMEOUTS: PipelineConfig["timeouts"] = {
  generateMs: 180_000,
  validateMs: 120_000,
  persistMs: 30_000,
};

export interface StartRunOptions {
  collaborators: Collaborators;
  logger?: PipelineLogger;
  timeouts?: Partial<PipelineConfig["timeouts"]>;
  classifier?: ClassifyOptions;
  signal?: AbortSignal;
  runId?: string;
  /** Overrides the stage-invocation cap derived from the retry budget. */
  maxStageInvocations?: number;
}

export function formatRunId(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

export function createRunId(date = new Date()): string {
  return `${formatRunId(date)}-${randomUUID().slice(0, 8)}`;
}

export function createInitialRunState(runId: string, query: string, retryBudget: number): RunState {
  return {
    runId,
    query,
    candidateText: "",
    primaryName: "",
    artifacts: [],
    validationLog: "",
    retryCount: 0,
    retryBudget,
    changeLog: [],
    terminal: "RUNNING",
    routeDecision: "VALIDATING",
    lastClassification: null,
    storageHandle: null,
    validationPasses: 0,
    stageHistory: [],
    failure: null,
  };
}

function findPipelineError(error: unknown): PipelineError | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if (current instanceof PipelineError) return current;
    current = current.cause;
  }
  return undefined;
}

function describeFailure(error: unknown): RunFailure {
  const known = findPipelineError(error);
  if (known) return { stage: known.stage, kind: known.kind, message: known.message };
  if (error instanceof GraphRecursionError) return { stage: null, kind: "stage_cap", message: error.message };
  return { stage: null, kind: "collaborator", message: errorMessage(error) };
}

/**
 * The single place where a stage error becomes a terminal state. The last
 * state a stage handed back is kept as-is; cancellation leaves `terminal`
 * unset.
 */
export function stopOnError(state: RunState, error: unknown): RunState {
  const failure = describeFailure(error);
  return {
    ...state,
    terminal: failure.kind === "cancelled" ? null : "FAILED_UNCLASSIFIABLE",
    failure,
  };
}

export async function startRun(query: string, retryBudget: number, options: StartRunOptions): Promise<RunState> {
  if (!Number.isInteger(retryBudget) || retryBudget < 0) {
    throw new RangeError(`retryBudget must be a non-negative integer, got ${retryBudget}`);
  }
  if (!query.trim()) {
    throw new RangeError("query must not be empty");
  }

  const emit = options.logger?.log ?? (() => {});
  const runId = options.runId ?? createRunId();
  const initial = createInitialRunState(runId, query, retryBudget);
  const maxStageInvocations = options.maxStageInvocations ?? stageInvocationCap(retryBudget);
  let latest = initial;

  const graph = createPipelineGraph({
    collaborators: options.collaborators,
    timeouts: { ...DEFAULT_TIMEOUTS, ...options.timeouts },
    maxStageInvocations,
    logger: options.logger,
    classifier: options.classifier,
    signal: options.signal,
    onSnapshot: (state) => {
      latest = state;
    },
  });

  emit({
    node: "engine",
    level: "info",
    event: "RUN_START",
    data: { query, retry_budget: retryBudget, max_stage_invocations: maxStageInvocations },
  });

  let finalState: RunState;
  try {
    finalState = await graph.invoke(initial, { recursionLimit: maxStageInvocations + 2 });
  } catch (error) {
    finalState = stopOnError(latest, error);
    emit({
      node: "engine",
      level: finalState.failure?.kind === "cancelled" ? "warn" : "error",
      event: finalState.failure?.kind === "cancelled" ? "RUN_CANCELLED" : "RUN_FAILED",
      data: { ...finalState.failure, retry_count: finalState.retryCount },
    });
  }

  emit({
    node: "engine",
    level: finalState.terminal === "SUCCEEDED" ? "info" : "warn",
    event: "RUN_DONE",
    data: {
      terminal: finalState.terminal,
      retry_count: finalState.retryCount,
      validation_passes: finalState.validationPasses,
      changes: summarizeChangeLog(finalState.changeLog),
    },
  });
  return finalState;
}
