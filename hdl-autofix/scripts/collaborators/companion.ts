import { declaredName } from "../artifactStore";
import { buildCompanionPrompt, parseFileMap } from "../prompts";
import { sanitizeFileName } from "./decomposer";
import type { CompanionGenerator, Generator } from "./types";

/** Writes the testbench for the top module; unparsable answers are errors. */
export function createLlmCompanionGenerator(generator: Generator): CompanionGenerator {
  return {
    async generateCompanion(primaryName, primaryContent, goal, ctx, options = {}) {
      const prompt = buildCompanionPrompt({
        primaryName,
        primaryContent,
        goal,
        includeFiles: options.includeFiles ?? [],
      });
      const response = await generator.generate(prompt, ctx);
      const files = parseFileMap(response);
      const [name, content] = Object.entries(files)[0];
      if (!content.trim()) {
        throw new Error("Companion generator returned an empty testbench");
      }
      const companionName = name.trim() ? sanitizeFileName(name.trim()) : `${declaredName(primaryName)}_tb.v`;
      return { companionName, companionContent: content };
    },
  };
}
