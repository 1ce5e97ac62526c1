import { createHash } from "node:crypto";
import { HttpStatusError, isTransientHttpError, withRetry } from "./retry";
import type { LLMProvider, LlmAudit } from "./types";

export interface ChatTextParams {
  systemPrompt: string;
  userPrompt: string;
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
  httpRetries?: number;
  signal?: AbortSignal;
  audit?: {
    run_id: string;
    role: string;
    onAudit?: (audit: LlmAudit) => void;
  };
}

interface ProviderRuntimeConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

const PROVIDERS: readonly LLMProvider[] = ["openai", "anthropic", "gemini", "qwen", "deepseek"];

function isProvider(value: string | undefined): value is LLMProvider {
  return PROVIDERS.some((provider) => provider === value);
}

function extractContent(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    return raw
      .map((item: unknown) => {
        if (typeof item === "string") return item;
        if (typeof item === "object" && item !== null && "text" in item) {
          return typeof item.text === "string" ? item.text : "";
        }
        return "";
      })
      .join("");
  }
  return "";
}

export function resolveProvider(input?: LLMProvider): LLMProvider {
  const envProvider = process.env.LLM_PROVIDER?.toLowerCase();
  if (isProvider(envProvider)) return envProvider;
  return input ?? "gemini";
}

function requireKey(name: string, provider: LLMProvider): string {
  const value = process.env[name];
  if (!value) throw new Error(`${name} is required when provider=${provider}.`);
  return value;
}

export function resolveProviderRuntimeConfig(params: {
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
}): ProviderRuntimeConfig {
  const provider = resolveProvider(params.provider);
  const temperature = params.temperature ?? 0.2;
  const normalizeBase = (base: string): string => base.replace(/\/+$/, "");
  const env = process.env;

  switch (provider) {
    case "openai":
      return {
        provider,
        apiKey: requireKey("OPENAI_API_KEY", provider),
        baseUrl: normalizeBase(env.OPENAI_BASE_URL ?? "https://api.openai.com/v1"),
        model: env.OPENAI_MODEL ?? env.LLM_MODEL ?? params.model ?? "gpt-4o",
        temperature,
      };
    case "anthropic":
      return {
        provider,
        apiKey: requireKey("ANTHROPIC_API_KEY", provider),
        baseUrl: normalizeBase(env.ANTHROPIC_BASE_URL ?? "https://api.anthropic.com/v1"),
        model: env.ANTHROPIC_MODEL ?? env.LLM_MODEL ?? params.model ?? "claude-3-5-sonnet-latest",
        temperature,
      };
    case "gemini":
      return {
        provider,
        apiKey: requireKey("GEMINI_API_KEY", provider),
        baseUrl: normalizeBase(env.GEMINI_BASE_URL ?? "https://generativelanguage.googleapis.com/v1beta"),
        model: env.GEMINI_MODEL ?? env.LLM_MODEL ?? params.model ?? "gemini-2.5-pro",
        temperature,
      };
    case "qwen":
      return {
        provider,
        apiKey: requireKey("QWEN_API_KEY", provider),
        baseUrl: normalizeBase(env.QWEN_BASE_URL ?? "https://dashscope.aliyuncs.com/compatible-mode/v1"),
        model: env.QWEN_MODEL ?? env.LLM_MODEL ?? params.model ?? "qwen-max",
        temperature,
      };
    case "deepseek":
      return {
        provider,
        apiKey: requireKey("DEEPSEEK_API_KEY", provider),
        baseUrl: normalizeBase(env.DEEPSEEK_BASE_URL ?? "https://api.deepseek.com/v1"),
        model: env.DEEPSEEK_MODEL ?? env.LLM_MODEL ?? params.model ?? "deepseek-chat",
        temperature,
      };
  }
}

async function ensureOk(response: Response): Promise<void> {
  if (response.ok) return;
  const body = await response.text();
  throw new HttpStatusError(response.status, `LLM HTTP ${response.status} ${response.statusText}: ${body}`);
}

async function callOpenAICompatible(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  const response = await fetch(`${config.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: config.model,
      temperature: config.temperature,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    }),
    signal,
  });
  await ensureOk(response);

  const data = (await response.json()) as {
    choices?: Array<{ message?: { content?: unknown } }>;
  };
  return extractContent(data.choices?.[0]?.message?.content ?? "");
}

async function callAnthropic(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  const response = await fetch(`${config.baseUrl}/messages`, {
    method: "POST",
    headers: {
      "x-api-key": config.apiKey,
      "anthropic-version": "2023-06-01",
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: config.model,
      max_tokens: 8192,
      temperature: config.temperature,
      system: systemPrompt,
      messages: [{ role: "user", content: userPrompt }],
    }),
    signal,
  });
  await ensureOk(response);

  const data = (await response.json()) as {
    content?: Array<{ type?: string; text?: string }>;
  };
  return (data.content ?? [])
    .filter((part) => part.type === "text")
    .map((part) => part.text ?? "")
    .join("");
}

async function callGemini(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  const url = `${config.baseUrl}/models/${encodeURIComponent(config.model)}:generateContent?key=${encodeURIComponent(config.apiKey)}`;
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      systemInstruction: { parts: [{ text: systemPrompt }] },
      contents: [{ role: "user", parts: [{ text: userPrompt }] }],
      generationConfig: { temperature: config.temperature },
    }),
    signal,
  });
  await ensureOk(response);

  const data = (await response.json()) as {
    candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
  };
  return (data.candidates?.[0]?.content?.parts ?? []).map((part) => part.text ?? "").join("");
}

async function callProvider(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  if (config.provider === "anthropic") return callAnthropic(config, systemPrompt, userPrompt, signal);
  if (config.provider === "gemini") return callGemini(config, systemPrompt, userPrompt, signal);
  return callOpenAICompatible(config, systemPrompt, userPrompt, signal);
}

export async function chatText(params: ChatTextParams): Promise<{
  content: string;
  usageApprox: { promptChars: number; completionChars: number };
}> {
  const startedAt = Date.now();
  const config = resolveProviderRuntimeConfig({
    provider: params.provider,
    model: params.model,
    temperature: params.temperature,
  });
  const promptHash = createHash("sha256")
    .update(params.systemPrompt)
    .update("\n\n")
    .update(params.userPrompt)
    .digest("hex");
  const promptChars = params.systemPrompt.length + params.userPrompt.length;

  let retryCount = 0;
  const emitAudit = (completionChars: number, errorMessage?: string) => {
    if (!params.audit?.onAudit) return;
    params.audit.onAudit({
      ts: new Date().toISOString(),
      run_id: params.audit.run_id,
      role: params.audit.role,
      provider: config.provider,
      model: config.model,
      temperature: config.temperature,
      prompt_hash: promptHash,
      prompt_chars: promptChars,
      completion_chars: completionChars,
      retry_count: retryCount,
      duration_ms: Date.now() - startedAt,
      ...(errorMessage ? { error: errorMessage.slice(0, 200) } : {}),
    });
  };

  try {
    const content = await withRetry(
      async (attempt) => {
        retryCount = attempt;
        return callProvider(config, params.systemPrompt, params.userPrompt, params.signal);
      },
      {
        retries: params.httpRetries ?? 2,
        baseDelayMs: 1000,
        maxDelayMs: 8000,
        jitter: true,
        retryOn: isTransientHttpError,
        signal: params.signal,
      },
    );
    emitAudit(content.length);
    return { content, usageApprox: { promptChars, completionChars: content.length } };
  } catch (error) {
    const reason = error instanceof Error ? error : new Error(String(error));
    emitAudit(0, reason.message);
    throw reason;
  }
}
