import { classifyWithEvidence, type ClassifyOptions } from "./classifier";
import type { ArtifactStore, Classification, RouterState } from "./types";

export interface RouterInput {
  validationLog: string;
  retryCount: number;
  retryBudget: number;
  artifacts: ArtifactStore;
}

export interface RouterDecision {
  next: Exclude<RouterState, "VALIDATING">;
  retryCount: number;
  classification: Classification | null;
}

/**
 * Conditional edge evaluated right after every validation. Pure: the same
 * snapshot always yields the same decision, and the only counter it touches
 * is the one it returns.
 */
export function route(input: RouterInput, options: ClassifyOptions = {}): RouterDecision {
  if (!input.validationLog) {
    return { next: "SUCCESS", retryCount: input.retryCount, classification: null };
  }
  if (input.retryCount >= input.retryBudget) {
    return { next: "BUDGET_EXCEEDED", retryCount: input.retryCount, classification: null };
  }

  const classification = classifyWithEvidence(input.validationLog, input.artifacts, options);
  return {
    next: classification.category === "COMPANION" ? "CORRECT_COMPANION" : "CORRECT_PRIMARY",
    retryCount: input.retryCount + 1,
    classification,
  };
}

export function isTerminalDecision(state: RouterState): boolean {
  return state === "SUCCESS" || state === "BUDGET_EXCEEDED";
}
