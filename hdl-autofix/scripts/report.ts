import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { summarizeChangeLog } from "./changeLog";
import type { LlmAudit, PipelineEvent, RunState } from "./types";

export interface RunReport {
  run_id: string;
  query: string;
  terminal: RunState["terminal"];
  retry_count: number;
  retry_budget: number;
  validation_passes: number;
  last_validation_log: string;
  last_classification: RunState["lastClassification"];
  primary: string;
  storage_handle: string | null;
  failure: RunState["failure"];
  stage_history: RunState["stageHistory"];
  change_summary: Record<string, unknown>;
  change_log: Array<{
    ordinal: number;
    artifact: string;
    category: string;
    outcome: string;
    noop: boolean;
    lines_added: number;
    lines_removed: number;
    retry_count: number;
    at: string;
    diff: string;
  }>;
  artifacts: Array<{ name: string; role: string; bytes: number }>;
  llm_audits: LlmAudit[];
  events: PipelineEvent[];
}

export function buildRunReport(state: RunState, events: PipelineEvent[], audits: LlmAudit[] = []): RunReport {
  return {
    run_id: state.runId,
    query: state.query,
    terminal: state.terminal,
    retry_count: state.retryCount,
    retry_budget: state.retryBudget,
    validation_passes: state.validationPasses,
    last_validation_log: state.validationLog,
    last_classification: state.lastClassification,
    primary: state.primaryName,
    storage_handle: state.storageHandle,
    failure: state.failure,
    stage_history: state.stageHistory,
    change_summary: summarizeChangeLog(state.changeLog),
    change_log: state.changeLog.map((entry) => ({
      ordinal: entry.ordinal,
      artifact: entry.artifactName,
      category: entry.category,
      outcome: entry.outcome,
      noop: entry.noop,
      lines_added: entry.linesAdded,
      lines_removed: entry.linesRemoved,
      retry_count: entry.retryCount,
      at: entry.at,
      diff: entry.diff,
    })),
    artifacts: state.artifacts.map((entry) => ({
      name: entry.name,
      role: entry.role,
      bytes: Buffer.byteLength(entry.content, "utf-8"),
    })),
    llm_audits: audits,
    events,
  };
}

export async function writeRunReport(runsDir: string, report: RunReport): Promise<string> {
  await mkdir(runsDir, { recursive: true });
  const outPath = path.join(runsDir, `${report.run_id}.json`);
  await writeFile(outPath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  return outPath;
}
