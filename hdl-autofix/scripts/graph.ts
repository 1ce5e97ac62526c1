import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import {
  checkArtifactContract,
  createArtifactStore,
  getArtifact,
  mergeArtifacts,
  primaryArtifact,
  setArtifactContent,
  toContentMap,
} from "./artifactStore";
import { appendCorrection } from "./changeLog";
import type { ClassifyOptions } from "./classifier";
import type { CallContext, Collaborators, ValidationResult } from "./collaborators/types";
import { correctArtifact, resolveImplicatedArtifact, type CorrectorRole } from "./corrector";
import {
  CollaboratorError,
  ContractViolationError,
  PipelineError,
  RunCancelledError,
  StageCapExceededError,
  StageTimeoutError,
  withTimeout,
} from "./errors";
import type { PipelineLogger } from "./logger";
import { buildGenerationPrompt, extractCodeBlock } from "./prompts";
import { route } from "./router";
import type { ArtifactStore, PipelineConfig, RunState, StageName } from "./types";

/** generate, decompose, generate_companion, persist, validate, route */
export const PIPELINE_LENGTH = 6;
/** correct_*, persist, validate, route */
export const CORRECTION_CYCLE_LENGTH = 4;

export function stageInvocationCap(retryBudget: number): number {
  return PIPELINE_LENGTH + retryBudget * CORRECTION_CYCLE_LENGTH;
}

export interface PipelineGraphDeps {
  collaborators: Collaborators;
  timeouts: PipelineConfig["timeouts"];
  maxStageInvocations: number;
  logger?: PipelineLogger;
  classifier?: ClassifyOptions;
  signal?: AbortSignal;
  /** Receives every state a stage hands back, for recovery when a later stage throws. */
  onSnapshot?: (state: RunState) => void;
}

function assertContract(stage: StageName, store: ArtifactStore): void {
  const violations = checkArtifactContract(store);
  if (violations.length > 0) throw new ContractViolationError(stage, violations);
}

export function createPipelineGraph(deps: PipelineGraphDeps) {
  const emit = deps.logger?.log ?? (() => {});
  const { generator, decomposer, companionGenerator, validator, persistence } = deps.collaborators;
  const timeouts = deps.timeouts;
  let invocations = 0;

  const RunStateAnnotation = Annotation.Root({
    runId: Annotation<string>(),
    query: Annotation<string>(),
    candidateText: Annotation<string>(),
    primaryName: Annotation<string>(),
    artifacts: Annotation<RunState["artifacts"]>(),
    validationLog: Annotation<string>(),
    retryCount: Annotation<number>(),
    retryBudget: Annotation<number>(),
    changeLog: Annotation<RunState["changeLog"]>(),
    terminal: Annotation<RunState["terminal"]>(),
    routeDecision: Annotation<RunState["routeDecision"]>(),
    lastClassification: Annotation<RunState["lastClassification"]>(),
    storageHandle: Annotation<RunState["storageHandle"]>(),
    validationPasses: Annotation<number>(),
    stageHistory: Annotation<RunState["stageHistory"]>(),
    failure: Annotation<RunState["failure"]>(),
  });

  const stage =
    (name: StageName, body: (state: RunState) => Promise<RunState>) =>
    async (state: RunState): Promise<RunState> => {
      if (deps.signal?.aborted) throw new RunCancelledError(name);
      if (invocations >= deps.maxStageInvocations) {
        throw new StageCapExceededError(name, deps.maxStageInvocations);
      }
      invocations += 1;
      emit({
        node: name,
        level: "debug",
        event: "STAGE_START",
        data: { invocation: invocations, retry_count: state.retryCount },
      });
      const next = await body(state);
      const recorded: RunState = { ...next, stageHistory: [...state.stageHistory, name] };
      deps.onSnapshot?.(recorded);
      return recorded;
    };

  const call = async <T>(
    name: StageName,
    timeoutMs: number,
    state: RunState,
    fn: (ctx: CallContext) => Promise<T>,
  ): Promise<T> => {
    try {
      return await withTimeout(
        name,
        timeoutMs,
        (signal) => fn({ runId: state.runId, query: state.query, stage: name, signal }),
        deps.signal,
      );
    } catch (error) {
      // an aborted fetch or child process surfaces as its own error; the run was cancelled
      if (deps.signal?.aborted) throw new RunCancelledError(name, "during");
      if (error instanceof PipelineError) throw error;
      throw new CollaboratorError(name, error);
    }
  };

  const correction = (name: StageName, role: CorrectorRole) =>
    stage(name, async (state) => {
      const target = resolveImplicatedArtifact(role, state.artifacts, state.validationLog);
      if (!target) {
        throw new ContractViolationError(name, [`no ${role.toLowerCase()} artifact to correct`]);
      }
      emit({
        node: name,
        level: "info",
        event: "CORRECTION_START",
        data: { artifact: target.name, retry_count: state.retryCount, retry_budget: state.retryBudget },
      });

      const outcome = await correctArtifact({
        role,
        store: state.artifacts,
        artifactName: target.name,
        validationLog: state.validationLog,
        generate: (prompt) => call(name, timeouts.generateMs, state, (ctx) => generator.generate(prompt, ctx)),
      });

      const changeLog = appendCorrection(state.changeLog, {
        artifactName: target.name,
        role: target.role,
        category: role,
        beforeContent: outcome.beforeContent,
        afterContent: outcome.afterContent,
        outcome: outcome.outcome,
        retryCount: state.retryCount,
      });
      const entry = changeLog[changeLog.length - 1];
      emit({
        node: name,
        level: entry.noop ? "warn" : "info",
        event: entry.noop ? "CORRECTION_NOOP" : "CORRECTION_APPLIED",
        data: {
          artifact: entry.artifactName,
          outcome: entry.outcome,
          lines_added: entry.linesAdded,
          lines_removed: entry.linesRemoved,
          detail: outcome.detail ?? null,
        },
      });

      return {
        ...state,
        artifacts: entry.noop
          ? state.artifacts
          : setArtifactContent(state.artifacts, target.name, outcome.afterContent),
        changeLog,
      };
    });

  return new StateGraph(RunStateAnnotation)
    .addNode(
      "generate",
      stage("generate", async (state) => {
        const raw = await call("generate", timeouts.generateMs, state, (ctx) =>
          generator.generate(buildGenerationPrompt(state.query), ctx),
        );
        const candidateText = extractCodeBlock(raw);
        if (!candidateText) {
          throw new CollaboratorError("generate", new Error("generator returned no code"));
        }
        emit({ node: "generate", level: "info", event: "GENERATION_OK", data: { chars: candidateText.length } });
        return { ...state, candidateText };
      }),
    )
    .addNode(
      "decompose",
      stage("decompose", async (state) => {
        const result = await call("decompose", timeouts.generateMs, state, (ctx) =>
          decomposer.decompose(state.candidateText, state.query, ctx),
        );
        const artifacts = createArtifactStore(result.artifacts);
        assertContract("decompose", artifacts);
        if (primaryArtifact(artifacts)?.name !== result.primaryName) {
          throw new ContractViolationError("decompose", [`primary artifact is not ${result.primaryName}`]);
        }
        emit({
          node: "decompose",
          level: "info",
          event: "DECOMPOSE_OK",
          data: { primary: result.primaryName, files: artifacts.map((entry) => entry.name) },
        });
        return { ...state, artifacts, primaryName: result.primaryName };
      }),
    )
    .addNode(
      "generate_companion",
      stage("generate_companion", async (state) => {
        const primary = primaryArtifact(state.artifacts);
        if (!primary) throw new ContractViolationError("generate_companion", ["no primary artifact"]);
        const includeFiles = state.artifacts
          .filter((entry) => entry.role === "dependency" && entry.name.endsWith(".vh"))
          .map((entry) => entry.name);

        const companion = await call("generate_companion", timeouts.generateMs, state, (ctx) =>
          companionGenerator.generateCompanion(primary.name, primary.content, state.query, ctx, { includeFiles }),
        );
        if (getArtifact(state.artifacts, companion.companionName)) {
          throw new ContractViolationError("generate_companion", [
            `companion name ${companion.companionName} collides with an existing artifact`,
          ]);
        }
        const artifacts = mergeArtifacts(state.artifacts, [
          { name: companion.companionName, role: "companion", content: companion.companionContent },
        ]);
        assertContract("generate_companion", artifacts);
        emit({
          node: "generate_companion",
          level: "info",
          event: "COMPANION_OK",
          data: { companion: companion.companionName, includes: includeFiles },
        });
        return { ...state, artifacts };
      }),
    )
    .addNode(
      "persist",
      stage("persist", async (state) => {
        const storageHandle = await call("persist", timeouts.persistMs, state, (ctx) =>
          persistence.persist(toContentMap(state.artifacts), ctx),
        );
        emit({ node: "persist", level: "info", event: "PERSIST_OK", data: { handle: storageHandle } });
        return { ...state, storageHandle };
      }),
    )
    .addNode(
      "validate",
      stage("validate", async (state) => {
        let result: ValidationResult;
        try {
          result = await call("validate", timeouts.validateMs, state, (ctx) =>
            validator.validate(toContentMap(state.artifacts), ctx),
          );
        } catch (error) {
          if (!(error instanceof StageTimeoutError)) throw error;
          result = { passed: false, log: `ERROR: Validation timed out after ${error.timeoutMs}ms.` };
        }
        const validationLog = result.passed
          ? ""
          : result.log.trim() || "ERROR: Validation failed without diagnostic output.";
        emit({
          node: "validate",
          level: result.passed ? "info" : "warn",
          event: result.passed ? "VALIDATION_PASSED" : "VALIDATION_FAILED",
          data: { pass: state.validationPasses + 1, log_excerpt: validationLog },
        });
        return { ...state, validationLog, validationPasses: state.validationPasses + 1 };
      }),
    )
    .addNode(
      "route",
      stage("route", async (state) => {
        const decision = route(
          {
            validationLog: state.validationLog,
            retryCount: state.retryCount,
            retryBudget: state.retryBudget,
            artifacts: state.artifacts,
          },
          deps.classifier,
        );
        const terminal =
          decision.next === "SUCCESS"
            ? "SUCCEEDED"
            : decision.next === "BUDGET_EXCEEDED"
              ? "FAILED_BUDGET_EXCEEDED"
              : "RUNNING";
        emit({
          node: "route",
          level: decision.next === "BUDGET_EXCEEDED" ? "warn" : "info",
          event: "ROUTE_DECISION",
          data: {
            next: decision.next,
            retry_count: decision.retryCount,
            retry_budget: state.retryBudget,
            category: decision.classification?.category ?? null,
            signal: decision.classification?.signal ?? null,
            matched: decision.classification?.matched ?? null,
          },
        });
        return {
          ...state,
          routeDecision: decision.next,
          retryCount: decision.retryCount,
          lastClassification: decision.classification ?? state.lastClassification,
          terminal,
        };
      }),
    )
    .addNode("correct_primary", correction("correct_primary", "PRIMARY"))
    .addNode("correct_companion", correction("correct_companion", "COMPANION"))
    .addEdge(START, "generate")
    .addEdge("generate", "decompose")
    .addEdge("decompose", "generate_companion")
    .addEdge("generate_companion", "persist")
    .addEdge("persist", "validate")
    .addEdge("validate", "route")
    .addConditionalEdges("route", (state: RunState) => state.routeDecision, {
      SUCCESS: END,
      BUDGET_EXCEEDED: END,
      CORRECT_PRIMARY: "correct_primary",
      CORRECT_COMPANION: "correct_companion",
    })
    .addEdge("correct_primary", "persist")
    .addEdge("correct_companion", "persist")
    .compile();
}
