import type { PromptPair } from "../prompts";
import type { ArtifactEntry, StageName } from "../types";

export interface CallContext {
  runId: string;
  query: string;
  stage: StageName;
  signal?: AbortSignal;
}

export interface Generator {
  generate(prompt: PromptPair, ctx: CallContext): Promise<string>;
}

export interface DecomposeResult {
  primaryName: string;
  artifacts: ArtifactEntry[];
}

export interface Decomposer {
  decompose(candidateText: string, query: string, ctx: CallContext): Promise<DecomposeResult>;
}

export interface CompanionResult {
  companionName: string;
  companionContent: string;
}

export interface CompanionOptions {
  /** Header files the companion should `include. */
  includeFiles?: string[];
}

export interface CompanionGenerator {
  generateCompanion(
    primaryName: string,
    primaryContent: string,
    goal: string,
    ctx: CallContext,
    options?: CompanionOptions,
  ): Promise<CompanionResult>;
}

export interface ValidationResult {
  passed: boolean;
  log: string;
}

export interface Validator {
  validate(artifacts: Record<string, string>, ctx: CallContext): Promise<ValidationResult>;
}

export interface Persistence {
  persist(artifacts: Record<string, string>, ctx: CallContext): Promise<string>;
}

export interface Collaborators {
  generator: Generator;
  decomposer: Decomposer;
  companionGenerator: CompanionGenerator;
  validator: Validator;
  persistence: Persistence;
}
