import type { FailureKind, StageName } from "./types";

export class PipelineError extends Error {
  readonly kind: FailureKind;
  readonly stage: StageName | null;

  constructor(kind: FailureKind, stage: StageName | null, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
    this.stage = stage;
  }
}

export class CollaboratorError extends PipelineError {
  constructor(stage: StageName, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("collaborator", stage, `${stage} collaborator failed: ${detail}`, { cause });
    this.name = "CollaboratorError";
  }
}

export class StageTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(stage: StageName, timeoutMs: number) {
    super("timeout", stage, `${stage} timed out after ${timeoutMs}ms`);
    this.name = "StageTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ContractViolationError extends PipelineError {
  readonly violations: string[];

  constructor(stage: StageName, violations: string[]) {
    super("contract", stage, `artifact contract violated: ${violations.join("; ")}`);
    this.name = "ContractViolationError";
    this.violations = violations;
  }
}

export class StageCapExceededError extends PipelineError {
  constructor(stage: StageName, cap: number) {
    super("stage_cap", stage, `stage invocation cap of ${cap} reached before ${stage}`);
    this.name = "StageCapExceededError";
  }
}

export class RunCancelledError extends PipelineError {
  constructor(stage: StageName, phase: "before" | "during" = "before") {
    super("cancelled", stage, `run cancelled ${phase} ${stage}`);
    this.name = "RunCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Races `task` against a timer; rejects with StageTimeoutError when the timer
 * wins. The task gets its own signal, aborted when the timer fires or when
 * `parent` aborts, so a losing call is stopped rather than left running.
 */
export async function withTimeout<T>(
  stage: StageName,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) forwardAbort();
  else parent?.addEventListener("abort", forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new StageTimeoutError(stage, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
