import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_COMPANION_MARKERS } from "./classifier";
import { DEFAULT_TIMEOUTS } from "./engine";
import type { PipelineConfig } from "./types";

export const DEFAULT_CONFIG_PATH = path.join("hdl-autofix", "config", "pipeline.config.json");

const ProviderSchema = z.enum(["openai", "anthropic", "gemini", "qwen", "deepseek"]);

export const PipelineConfigSchema = z
  .object({
    retryBudget: z.number().int().min(0).optional(),
    concurrency: z.number().int().min(1).optional(),
    llm: z
      .object({
        provider: ProviderSchema.optional(),
        model: z.string().min(1).optional(),
        temperature: z.number().min(0).max(2).optional(),
        httpRetries: z.number().int().min(0).max(10).optional(),
      })
      .optional(),
    timeouts: z
      .object({
        generateMs: z.number().int().positive().optional(),
        validateMs: z.number().int().positive().optional(),
        persistMs: z.number().int().positive().optional(),
      })
      .optional(),
    validator: z
      .object({
        iverilogPath: z.string().min(1).optional(),
        vvpPath: z.string().min(1).optional(),
        commandTimeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    classifier: z
      .object({
        companionMarkers: z.array(z.string().min(1)).optional(),
      })
      .optional(),
    output: z
      .object({
        designsDir: z.string().min(1).optional(),
        runsDir: z.string().min(1).optional(),
      })
      .optional(),
  })
  .strict();

export type PipelineConfigInput = z.infer<typeof PipelineConfigSchema>;

export function withDefaults(config: PipelineConfigInput): PipelineConfig {
  return {
    retryBudget: config.retryBudget ?? 10,
    concurrency: config.concurrency ?? 1,
    llm: {
      provider: config.llm?.provider,
      model: config.llm?.model,
      temperature: config.llm?.temperature ?? 0.2,
      httpRetries: config.llm?.httpRetries ?? 2,
    },
    timeouts: {
      generateMs: config.timeouts?.generateMs ?? DEFAULT_TIMEOUTS.generateMs,
      validateMs: config.timeouts?.validateMs ?? DEFAULT_TIMEOUTS.validateMs,
      persistMs: config.timeouts?.persistMs ?? DEFAULT_TIMEOUTS.persistMs,
    },
    validator: {
      iverilogPath: config.validator?.iverilogPath ?? "iverilog",
      vvpPath: config.validator?.vvpPath ?? "vvp",
      commandTimeoutMs: config.validator?.commandTimeoutMs ?? 30_000,
    },
    classifier: {
      companionMarkers: config.classifier?.companionMarkers ?? [...DEFAULT_COMPANION_MARKERS],
    },
    output: {
      designsDir: config.output?.designsDir ?? path.join("examples", "verilog_designs"),
      runsDir: config.output?.runsDir ?? "runs",
    },
  };
}

export function parseConfig(raw: unknown): PipelineConfig {
  return withDefaults(PipelineConfigSchema.parse(raw));
}

/** A missing file means defaults; a present but invalid one is an error. */
export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<PipelineConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return withDefaults({});
    throw error;
  }
  return parseConfig(JSON.parse(text));
}
