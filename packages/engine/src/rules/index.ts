import type { AlertDraft, ClassificationMap, Detection, SafetyConfig } from '@hearthwatch/shared';
import { checkFireSmoke } from './fireSmoke.js';
import { checkKnifeUnattended } from './knifeUnattended.js';
import { checkPanOverheating } from './panOverheating.js';
import { checkStoveUnattended } from './stoveUnattended.js';
import type { NamedRule } from './types.js';

// Evaluation order. Fire/smoke always first; the rest by decreasing severity.
export const HAZARD_RULES: readonly NamedRule[] = [
  { name: 'fire-smoke', evaluate: checkFireSmoke },
  { name: 'pan-overheating', evaluate: checkPanOverheating },
  { name: 'stove-unattended', evaluate: checkStoveUnattended },
  { name: 'knife-unattended', evaluate: checkKnifeUnattended },
];

export function runRules(
  detections: readonly Detection[],
  classifications: ClassificationMap,
  config: SafetyConfig,
  rules: readonly NamedRule[] = HAZARD_RULES,
): AlertDraft[] {
  const drafts: AlertDraft[] = [];
  for (const rule of rules) {
    const draft = rule.evaluate(detections, classifications, config);
    if (draft) drafts.push(draft);
  }
  return drafts;
}

export { checkFireSmoke, checkKnifeUnattended, checkPanOverheating, checkStoveUnattended };
export { PAN_ON_BURNER_DISTANCE } from './panOverheating.js';
export type { HazardRule, NamedRule } from './types.js';
