import { companionArtifacts, designArtifacts } from "./artifactStore";
import type { ArtifactCategory, ArtifactStore, Classification } from "./types";

/** Log fragments that point at the harness (it hung or never reached `$finish`). */
export const DEFAULT_COMPANION_MARKERS = ["timeout", "timed out"];

export interface ClassifyOptions {
  companionMarkers?: string[];
}

/**
 * Decides which side of the design/harness split a failing validation log
 * implicates. Signals, first match wins:
 *   1. a companion artifact name appears verbatim in the log
 *   2. a harness-fault marker appears and a companion exists
 *   3. a design artifact name appears verbatim in the log
 * Anything else is UNKNOWN. Callers route UNKNOWN to the primary corrector:
 * that is a policy, the design is presumed at fault whenever the log does not
 * clearly name the harness.
 */
export function classifyWithEvidence(
  validationLog: string,
  artifacts: ArtifactStore,
  options: ClassifyOptions = {},
): Classification {
  const companions = companionArtifacts(artifacts);

  for (const companion of companions) {
    if (validationLog.includes(companion.name)) {
      return { category: "COMPANION", signal: "companion_name", matched: companion.name };
    }
  }

  if (companions.length > 0) {
    const lowered = validationLog.toLowerCase();
    const markers = options.companionMarkers ?? DEFAULT_COMPANION_MARKERS;
    const marker = markers.find((item) => item && lowered.includes(item.toLowerCase()));
    if (marker) {
      return { category: "COMPANION", signal: "companion_marker", matched: marker };
    }
  }

  for (const design of designArtifacts(artifacts)) {
    if (validationLog.includes(design.name)) {
      return { category: "PRIMARY", signal: "design_name", matched: design.name };
    }
  }

  return { category: "UNKNOWN", signal: "none", matched: null };
}

export function classify(
  validationLog: string,
  artifacts: ArtifactStore,
  options: ClassifyOptions = {},
): ArtifactCategory {
  return classifyWithEvidence(validationLog, artifacts, options).category;
}
