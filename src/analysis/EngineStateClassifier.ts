/**
 * Engine state classification.
 *
 * Guards are evaluated in order and the first match wins:
 *   1. Critical        severity ≥ 3, or shimmer above the critical threshold
 *   2. TonalDominance  a non-silent spectrum with entropy below the tonal threshold
 *   3. Descriptor      severity ≥ 1
 *   4. Baseline        otherwise
 */

import type { ClassifierConfig } from "../engine/config";
import type { EngineStateTag, Severity } from "../engine/types";

export interface StateInputs {
  severity: Severity;
  shimmer: number;
  /** Entropy of the dominant spectrum; null when no non-silent spectrum exists */
  spectralEntropy: number | null;
}

interface StateGuard {
  tag: EngineStateTag;
  when: (inputs: StateInputs, config: ClassifierConfig) => boolean;
}

const STATE_GUARDS: readonly StateGuard[] = [
  {
    tag: "Critical",
    when: ({ severity, shimmer }, config) => severity >= 3 || shimmer > config.criticalShimmer,
  },
  {
    tag: "TonalDominance",
    when: ({ spectralEntropy }, config) =>
      spectralEntropy !== null && spectralEntropy < config.tonalEntropy,
  },
  {
    tag: "Descriptor",
    when: ({ severity }) => severity >= 1,
  },
];

export function classifyEngineState(inputs: StateInputs, config: ClassifierConfig): EngineStateTag {
  for (const guard of STATE_GUARDS) {
    if (guard.when(inputs, config)) return guard.tag;
  }
  return "Baseline";
}
