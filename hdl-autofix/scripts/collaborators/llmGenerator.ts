import { chatText } from "../llm";
import type { LlmAudit, PipelineConfig } from "../types";
import type { Generator } from "./types";

export function createLlmGenerator(
  llm: PipelineConfig["llm"],
  options: { onAudit?: (audit: LlmAudit) => void } = {},
): Generator {
  return {
    async generate(prompt, ctx) {
      const out = await chatText({
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        provider: llm.provider,
        model: llm.model,
        temperature: llm.temperature,
        httpRetries: llm.httpRetries,
        signal: ctx.signal,
        audit: { run_id: ctx.runId, role: ctx.stage, onAudit: options.onAudit },
      });
      return out.content;
    },
  };
}
