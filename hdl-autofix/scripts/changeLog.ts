import { createTwoFilesPatch, diffLines } from "diff";
import type { ArtifactRole, ChangeLogEntry, CorrectionOutcomeKind } from "./types";

export interface RecordCorrectionParams {
  artifactName: string;
  role: ArtifactRole;
  category: ChangeLogEntry["category"];
  beforeContent: string;
  afterContent: string;
  outcome: CorrectionOutcomeKind;
  retryCount: number;
  now?: () => Date;
}

export function unifiedDiff(artifactName: string, before: string, after: string): string {
  if (before === after) return "";
  return createTwoFilesPatch(`a/${artifactName}`, `b/${artifactName}`, before, after, undefined, undefined, {
    context: 3,
  });
}

function countChangedLines(before: string, after: string): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const part of diffLines(before, after)) {
    const lines = part.count ?? 0;
    if (part.added) added += lines;
    else if (part.removed) removed += lines;
  }
  return { added, removed };
}

/** Appends one entry per correction invocation; no-ops are kept and flagged. */
export function appendCorrection(log: readonly ChangeLogEntry[], params: RecordCorrectionParams): ChangeLogEntry[] {
  const noop = params.beforeContent === params.afterContent;
  const counts = noop ? { added: 0, removed: 0 } : countChangedLines(params.beforeContent, params.afterContent);
  const entry: ChangeLogEntry = {
    ordinal: log.length + 1,
    artifactName: params.artifactName,
    role: params.role,
    category: params.category,
    beforeContent: params.beforeContent,
    afterContent: params.afterContent,
    noop,
    outcome: noop && params.outcome === "patched" ? "unchanged" : params.outcome,
    diff: unifiedDiff(params.artifactName, params.beforeContent, params.afterContent),
    linesAdded: counts.added,
    linesRemoved: counts.removed,
    retryCount: params.retryCount,
    at: (params.now ?? (() => new Date()))().toISOString(),
  };
  return [...log, entry];
}

export function effectiveChanges(log: readonly ChangeLogEntry[]): ChangeLogEntry[] {
  return log.filter((entry) => !entry.noop);
}

export function noopChanges(log: readonly ChangeLogEntry[]): ChangeLogEntry[] {
  return log.filter((entry) => entry.noop);
}

export function summarizeChangeLog(log: readonly ChangeLogEntry[]): Record<string, unknown> {
  const byOutcome: Record<CorrectionOutcomeKind, number> = { patched: 0, unchanged: 0, malformed: 0, timeout: 0 };
  for (const entry of log) byOutcome[entry.outcome] += 1;
  return {
    corrections: log.length,
    effective: effectiveChanges(log).length,
    noop: noopChanges(log).length,
    by_outcome: byOutcome,
    artifacts: [...new Set(log.map((entry) => entry.artifactName))],
  };
}
