import type { EventLevel, PipelineEvent } from "./types";

const MAX_STRING_CHARS = 200;
const MAX_ARRAY_ITEMS = 20;
const MAX_DEPTH = 3;

const SECRET_KEY_FRAGMENTS = ["api_key", "apikey", "authorization", "token", "prompt"];

type KeyTreatment = "keep" | "redact" | "summarize";

/** Secrets are dropped; artifact bodies are reduced to their size. */
function treatmentFor(key: string): KeyTreatment {
  const normalized = key.toLowerCase();
  if (SECRET_KEY_FRAGMENTS.some((fragment) => normalized.includes(fragment))) return "redact";
  if (normalized.endsWith("content")) return "summarize";
  return "keep";
}

function clip(value: string): string {
  return value.length <= MAX_STRING_CHARS ? value : `${value.slice(0, MAX_STRING_CHARS)}…`;
}

function sanitizeValue(value: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) return "[truncated-depth]";
  if (typeof value === "string") return clip(value);
  if (typeof value === "number" || typeof value === "boolean" || value === null) return value;
  if (Array.isArray(value)) return value.slice(0, MAX_ARRAY_ITEMS).map((item) => sanitizeValue(item, depth + 1));
  if (typeof value === "object") return sanitizeEntries(Object.entries(value), depth + 1);
  return String(value);
}

function sanitizeEntries(entries: Array<[string, unknown]>, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, child] of entries) {
    const treatment = treatmentFor(key);
    if (treatment === "redact") out[key] = "[redacted]";
    else if (treatment === "summarize" && typeof child === "string") out[key] = `[${child.length} chars]`;
    else out[key] = sanitizeValue(child, depth);
  }
  return out;
}

export function safeData(input: unknown): Record<string, unknown> | undefined {
  if (!input || typeof input !== "object" || Array.isArray(input)) return undefined;
  return sanitizeEntries(Object.entries(input), 1);
}

export interface LogInput {
  node: string;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface PipelineLogger {
  log: (event: LogInput) => void;
  getEvents: () => PipelineEvent[];
}

export function formatEventLine(event: PipelineEvent): string {
  const data = event.data ? ` ${JSON.stringify(event.data)}` : "";
  return `[${event.ts}] ${event.level.toUpperCase().padEnd(5)} ${event.run_id} ${event.node} ${event.event}${data}`;
}

export function createLogger(runId: string, options: { echo?: (event: PipelineEvent) => void } = {}): PipelineLogger {
  const events: PipelineEvent[] = [];

  return {
    log({ node, level, event, data }) {
      const entry: PipelineEvent = { ts: new Date().toISOString(), run_id: runId, node, level, event, data: safeData(data) };
      events.push(entry);
      options.echo?.(entry);
    },
    getEvents() {
      return [...events];
    },
  };
}
