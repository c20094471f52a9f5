import type {
  AlertDraft,
  ClassificationMap,
  Detection,
  SafetyConfig,
} from '@hearthwatch/shared';

export type HazardRule = (
  detections: readonly Detection[],
  classifications: ClassificationMap,
  config: SafetyConfig,
) => AlertDraft | null;

export interface NamedRule {
  name: string;
  evaluate: HazardRule;
}

// Status strings the classifier emits.
export const STOVE_ON = 'ON';
export const KNIFE_UNATTENDED = 'unattended';
export const PAN_EMPTY = 'empty';
