import { createLlmCompanionGenerator } from "./collaborators/companion";
import { createLlmDecomposer } from "./collaborators/decomposer";
import { createIcarusValidator } from "./collaborators/icarus";
import { createLlmGenerator } from "./collaborators/llmGenerator";
import { createFilePersistence } from "./collaborators/persistence";
import type { Collaborators } from "./collaborators/types";
import { createRunId, startRun } from "./engine";
import { createLogger, formatEventLine, type PipelineLogger } from "./logger";
import { buildRunReport, writeRunReport } from "./report";
import type { LlmAudit, PipelineConfig, RunState } from "./types";

export function createDefaultCollaborators(
  config: PipelineConfig,
  logger: PipelineLogger,
  onAudit?: (audit: LlmAudit) => void,
): Collaborators {
  const generator = createLlmGenerator(config.llm, { onAudit });
  return {
    generator,
    decomposer: createLlmDecomposer(generator, {
      onFallback: (reason) =>
        logger.log({ node: "decompose", level: "warn", event: "DECOMPOSE_FALLBACK_MONOLITH", data: { reason } }),
    }),
    companionGenerator: createLlmCompanionGenerator(generator),
    validator: createIcarusValidator(config.validator),
    persistence: createFilePersistence(config.output.designsDir, {
      onSkip: (name) =>
        logger.log({ node: "persist", level: "warn", event: "PERSIST_SKIPPED_EMPTY", data: { artifact: name } }),
    }),
  };
}

export interface RunQueryOptions {
  retryBudget: number;
  verbose?: boolean;
  signal?: AbortSignal;
  /** Swaps the LLM/Icarus/filesystem collaborators, e.g. for dry runs. */
  collaborators?: (logger: PipelineLogger, onAudit: (audit: LlmAudit) => void) => Collaborators;
}

export async function runQuery(
  query: string,
  config: PipelineConfig,
  options: RunQueryOptions,
): Promise<{ state: RunState; reportPath: string }> {
  const runId = createRunId();
  const logger = createLogger(runId, {
    echo: options.verbose ? (event) => console.error(formatEventLine(event)) : undefined,
  });
  const audits: LlmAudit[] = [];
  const onAudit = (audit: LlmAudit) => {
    audits.push(audit);
  };
  const collaborators = options.collaborators
    ? options.collaborators(logger, onAudit)
    : createDefaultCollaborators(config, logger, onAudit);

  const state = await startRun(query, options.retryBudget, {
    collaborators,
    logger,
    runId,
    timeouts: config.timeouts,
    classifier: { companionMarkers: config.classifier.companionMarkers },
    signal: options.signal,
  });
  const reportPath = await writeRunReport(config.output.runsDir, buildRunReport(state, logger.getEvents(), audits));
  return { state, reportPath };
}
