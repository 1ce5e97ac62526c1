import type { ArtifactEntry, ArtifactRole, ArtifactStore } from "./types";

export function createArtifactStore(entries: ArtifactEntry[] = []): ArtifactStore {
  return mergeArtifacts([], entries);
}

export function getArtifact(store: ArtifactStore, name: string): ArtifactEntry | undefined {
  return store.find((entry) => entry.name === name);
}

export function artifactNames(store: ArtifactStore, role?: ArtifactRole): string[] {
  return store.filter((entry) => !role || entry.role === role).map((entry) => entry.name);
}

/** Replaces the content of an existing artifact in place, keeping its position and role. */
export function setArtifactContent(store: ArtifactStore, name: string, content: string): ArtifactStore {
  if (!getArtifact(store, name)) {
    throw new Error(`Unknown artifact: ${name}`);
  }
  return store.map((entry) => (entry.name === name ? { ...entry, content } : entry));
}

/**
 * Later entries win on name collision but keep the position of the first
 * occurrence, so names stay stable across merges.
 */
export function mergeArtifacts(store: ArtifactStore, incoming: readonly ArtifactEntry[]): ArtifactStore {
  const out: ArtifactEntry[] = store.map((entry) => ({ ...entry }));
  for (const entry of incoming) {
    const index = out.findIndex((existing) => existing.name === entry.name);
    if (index >= 0) out[index] = { ...entry };
    else out.push({ ...entry });
  }
  return out;
}

export function primaryArtifact(store: ArtifactStore): ArtifactEntry | undefined {
  return store.find((entry) => entry.role === "primary");
}

export function companionArtifacts(store: ArtifactStore): ArtifactEntry[] {
  return store.filter((entry) => entry.role === "companion");
}

export function designArtifacts(store: ArtifactStore): ArtifactEntry[] {
  return store.filter((entry) => entry.role !== "companion");
}

export function toContentMap(store: ArtifactStore): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of store) out[entry.name] = entry.content;
  return out;
}

/** `and_gate.v` -> `and_gate`; the identifier companions must reference. */
export function declaredName(artifactName: string): string {
  const base = artifactName.split(/[\\/]/).pop() ?? artifactName;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

export function checkArtifactContract(store: ArtifactStore): string[] {
  const violations: string[] = [];
  if (store.length === 0) {
    violations.push("no artifacts");
    return violations;
  }

  const primaries = store.filter((entry) => entry.role === "primary");
  if (primaries.length !== 1) {
    violations.push(`expected exactly one primary artifact, found ${primaries.length}`);
  }

  const seen = new Set<string>();
  for (const entry of store) {
    if (seen.has(entry.name)) violations.push(`duplicate artifact name ${entry.name}`);
    seen.add(entry.name);
    if (!entry.content.trim()) violations.push(`artifact ${entry.name} is empty`);
  }

  const primary = primaries[0];
  if (primary) {
    const declared = declaredName(primary.name);
    for (const companion of companionArtifacts(store)) {
      if (!companion.content.includes(declared)) {
        violations.push(`companion ${companion.name} does not reference ${declared}`);
      }
    }
  }
  return violations;
}
