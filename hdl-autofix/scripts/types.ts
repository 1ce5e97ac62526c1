export type ArtifactRole = "primary" | "dependency" | "companion";

export interface ArtifactEntry {
  name: string;
  role: ArtifactRole;
  content: string;
}

export type ArtifactStore = readonly ArtifactEntry[];

export type ArtifactCategory = "PRIMARY" | "COMPANION" | "UNKNOWN";

export type ClassificationSignal = "companion_name" | "companion_marker" | "design_name" | "none";

export interface Classification {
  category: ArtifactCategory;
  signal: ClassificationSignal;
  matched: string | null;
}

export type RouterState =
  | "VALIDATING"
  | "SUCCESS"
  | "CORRECT_PRIMARY"
  | "CORRECT_COMPANION"
  | "BUDGET_EXCEEDED";

export type TerminalState =
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED_BUDGET_EXCEEDED"
  | "FAILED_UNCLASSIFIABLE";

export type CorrectionOutcomeKind = "patched" | "unchanged" | "malformed" | "timeout";

export interface ChangeLogEntry {
  ordinal: number;
  artifactName: string;
  role: ArtifactRole;
  category: Exclude<ArtifactCategory, "UNKNOWN">;
  beforeContent: string;
  afterContent: string;
  noop: boolean;
  outcome: CorrectionOutcomeKind;
  diff: string;
  linesAdded: number;
  linesRemoved: number;
  retryCount: number;
  at: string;
}

export type StageName =
  | "generate"
  | "decompose"
  | "generate_companion"
  | "persist"
  | "validate"
  | "route"
  | "correct_primary"
  | "correct_companion";

export type FailureKind = "collaborator" | "timeout" | "contract" | "stage_cap" | "cancelled";

export interface RunFailure {
  stage: StageName | null;
  kind: FailureKind;
  message: string;
}

export interface RunState {
  runId: string;
  query: string;
  candidateText: string;
  primaryName: string;
  artifacts: ArtifactStore;
  validationLog: string;
  retryCount: number;
  retryBudget: number;
  changeLog: ChangeLogEntry[];
  /** `null` only when the run was cancelled between stages. */
  terminal: TerminalState | null;
  routeDecision: RouterState;
  lastClassification: Classification | null;
  storageHandle: string | null;
  validationPasses: number;
  stageHistory: StageName[];
  failure: RunFailure | null;
}

export type EventLevel = "debug" | "info" | "warn" | "error";

export interface PipelineEvent {
  ts: string;
  run_id: string;
  node: string;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export type LLMProvider = "openai" | "anthropic" | "gemini" | "qwen" | "deepseek";

export interface LlmAudit {
  ts: string;
  run_id: string;
  role: string;
  provider: LLMProvider;
  model: string;
  temperature: number;
  prompt_hash: string;
  prompt_chars: number;
  completion_chars: number;
  retry_count: number;
  duration_ms: number;
  error?: string;
}

export interface PipelineConfig {
  retryBudget: number;
  concurrency: number;
  llm: {
    provider?: LLMProvider;
    model?: string;
    temperature: number;
    httpRetries: number;
  };
  timeouts: {
    generateMs: number;
    validateMs: number;
    persistMs: number;
  };
  validator: {
    iverilogPath: string;
    vvpPath: string;
    commandTimeoutMs: number;
  };
  classifier: {
    companionMarkers: string[];
  };
  output: {
    designsDir: string;
    runsDir: string;
  };
}
