import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { sanitizeFileName } from "./decomposer";
import type { Persistence } from "./types";

export function toSafeQueryDirName(query: string): string {
  const slug = query
    .replace(/\W+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
  return `generated_${slug || "design"}`;
}

/** One directory per query under `rootDir`; blank artifacts are skipped. */
export function createFilePersistence(rootDir: string, options: { onSkip?: (name: string) => void } = {}): Persistence {
  return {
    async persist(artifacts, ctx) {
      const outDir = path.resolve(rootDir, toSafeQueryDirName(ctx.query));
      await mkdir(outDir, { recursive: true });
      for (const [name, content] of Object.entries(artifacts)) {
        if (!content.trim()) {
          options.onSkip?.(name);
          continue;
        }
        await writeFile(path.join(outDir, sanitizeFileName(name)), content, "utf-8");
      }
      return outDir;
    },
  };
}

export interface MemoryPersistence extends Persistence {
  snapshots: Array<Record<string, string>>;
}

export function createMemoryPersistence(): MemoryPersistence {
  const snapshots: Array<Record<string, string>> = [];
  return {
    snapshots,
    async persist(artifacts, ctx) {
      snapshots.push({ ...artifacts });
      return `memory://${ctx.runId}/${snapshots.length}`;
    },
  };
}
