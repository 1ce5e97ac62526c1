import { companionArtifacts, designArtifacts, getArtifact, primaryArtifact } from "./artifactStore";
import { StageTimeoutError } from "./errors";
import {
  buildCompanionCorrectionPrompt,
  buildPrimaryCorrectionPrompt,
  extractCodeBlock,
  parseFileMap,
  type PromptPair,
} from "./prompts";
import type { ArtifactEntry, ArtifactStore, CorrectionOutcomeKind } from "./types";

export type CorrectorRole = "PRIMARY" | "COMPANION";

/** A module body or a preprocessor directive; prose answers have neither. */
const VERILOG_HINT = /\bmodule\b|`(define|include|ifdef|ifndef|timescale)\b/;

export interface CorrectionOutcome {
  artifactName: string;
  beforeContent: string;
  afterContent: string;
  outcome: CorrectionOutcomeKind;
  detail?: string;
}

export interface CorrectParams {
  role: CorrectorRole;
  store: ArtifactStore;
  artifactName: string;
  validationLog: string;
  /** One generator call; already bounded by the engine's timeout. */
  generate: (prompt: PromptPair) => Promise<string>;
}

/**
 * Picks the artifact a correction should target. For the design side the
 * first design file named in the log wins, falling back to the primary; for
 * the harness side the first companion named in the log, else the first one.
 */
export function resolveImplicatedArtifact(
  role: CorrectorRole,
  store: ArtifactStore,
  validationLog: string,
): ArtifactEntry | undefined {
  const pool = role === "COMPANION" ? companionArtifacts(store) : designArtifacts(store);
  const named = pool.find((entry) => validationLog.includes(entry.name));
  if (named) return named;
  return role === "COMPANION" ? pool[0] : primaryArtifact(store);
}

function buildPrompt(params: CorrectParams, target: ArtifactEntry): PromptPair {
  if (params.role === "PRIMARY") {
    return buildPrimaryCorrectionPrompt({
      artifactName: target.name,
      content: target.content,
      validationLog: params.validationLog,
    });
  }
  const primary = primaryArtifact(params.store);
  if (!primary) throw new Error("Companion correction requires a primary artifact");
  return buildCompanionCorrectionPrompt({
    artifactName: target.name,
    content: target.content,
    validationLog: params.validationLog,
    primaryName: primary.name,
    primaryContent: primary.content,
  });
}

function parsePatch(role: CorrectorRole, artifactName: string, response: string): string {
  if (role === "PRIMARY") {
    const code = extractCodeBlock(response);
    if (!code) throw new Error("Response contained no code");
    if (!VERILOG_HINT.test(code)) throw new Error("Response contained no Verilog");
    return code;
  }
  const files = parseFileMap(response);
  const values = Object.values(files);
  const patched = files[artifactName] ?? (values.length === 1 ? values[0] : undefined);
  if (patched === undefined) throw new Error(`Response has no entry for ${artifactName}`);
  if (!patched.trim()) throw new Error(`Response entry for ${artifactName} is empty`);
  return patched;
}

/**
 * Produces a patched version of exactly one artifact. Malformed responses and
 * generator timeouts come back as the original content with the outcome set;
 * every other generator failure propagates.
 */
export async function correctArtifact(params: CorrectParams): Promise<CorrectionOutcome> {
  const target = getArtifact(params.store, params.artifactName);
  if (!target) throw new Error(`Cannot correct unknown artifact ${params.artifactName}`);

  const unchanged = (outcome: CorrectionOutcomeKind, detail: string): CorrectionOutcome => ({
    artifactName: target.name,
    beforeContent: target.content,
    afterContent: target.content,
    outcome,
    detail,
  });

  let response: string;
  try {
    response = await params.generate(buildPrompt(params, target));
  } catch (error) {
    if (error instanceof StageTimeoutError) return unchanged("timeout", error.message);
    throw error;
  }

  let patched: string;
  try {
    patched = parsePatch(params.role, target.name, response);
  } catch (error) {
    return unchanged("malformed", error instanceof Error ? error.message : String(error));
  }

  return {
    artifactName: target.name,
    beforeContent: target.content,
    afterContent: patched,
    outcome: patched === target.content ? "unchanged" : "patched",
  };
}
