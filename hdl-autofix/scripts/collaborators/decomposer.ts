import { buildDecompositionPrompt, DecompositionSchema, extractCodeBlock, extractFirstJsonObject } from "../prompts";
import type { ArtifactEntry } from "../types";
import type { Decomposer, DecomposeResult, Generator } from "./types";

const MODULE_PATTERN = /\bmodule\s+([A-Za-z_][A-Za-z0-9_$]*)/;

export function sanitizeFileName(name: string): string {
  return name.replace(/[^\w.-]/g, "_");
}

export function fallbackToMonolith(candidateText: string): DecomposeResult {
  const code = extractCodeBlock(candidateText);
  const match = MODULE_PATTERN.exec(code);
  if (!match) {
    throw new Error("Decomposition failed and the generated text declares no module");
  }
  const primaryName = `${match[1]}.v`;
  return { primaryName, artifacts: [{ name: primaryName, role: "primary", content: code }] };
}

export function toDecomposeResult(topModuleName: string, files: Record<string, string>): DecomposeResult {
  const entries = Object.entries(files).map(([name, content]) => [sanitizeFileName(name), content] as const);
  const preferred = `${sanitizeFileName(topModuleName)}.v`;
  const primaryName =
    entries.find(([name]) => name === preferred)?.[0] ?? entries.find(([name]) => name.endsWith(".v"))?.[0];
  if (!primaryName) {
    throw new Error(`Decomposition has no Verilog file for top module ${topModuleName}`);
  }

  const artifacts = entries.map(([name, content]): ArtifactEntry => ({
    name,
    role: name === primaryName ? "primary" : "dependency",
    content,
  }));
  // primary first
  artifacts.sort((a, b) => Number(b.role === "primary") - Number(a.role === "primary"));
  return { primaryName, artifacts };
}

/**
 * Splits monolithic generated Verilog into one file per module plus shared
 * headers. Falls back to a single-file design when the model's answer is not
 * a usable file map.
 */
export function createLlmDecomposer(
  generator: Generator,
  options: { onFallback?: (reason: string) => void } = {},
): Decomposer {
  return {
    async decompose(candidateText, query, ctx) {
      const response = await generator.generate(buildDecompositionPrompt(candidateText, query), ctx);
      try {
        const parsed = DecompositionSchema.parse(extractFirstJsonObject(response));
        return toDecomposeResult(parsed.top_module_name, parsed.files);
      } catch (error) {
        options.onFallback?.(error instanceof Error ? error.message : String(error));
        return fallbackToMonolith(candidateText);
      }
    },
  };
}
