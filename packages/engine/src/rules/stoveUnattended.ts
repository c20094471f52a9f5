import type { AlertDraft } from '@hearthwatch/shared';
import { classificationFor, findBest } from '../detectionIndex.js';
import { distance } from '../geometry.js';
import { STOVE_ON, type HazardRule } from './types.js';

/**
 * An active stove with nobody in frame is HIGH; with somebody further away
 * than `safeDistanceThreshold` it is MEDIUM. Distance is only measured once a
 * person has been found.
 */
export const checkStoveUnattended: HazardRule = (
  detections,
  classifications,
  config,
): AlertDraft | null => {
  const stove = findBest(detections, 'stove', config.confidenceThreshold);
  if (!stove) return null;

  const stoveState = classificationFor(stove, classifications);
  if (stoveState?.status !== STOVE_ON) return null;

  const person = findBest(detections, 'person', config.confidenceThreshold);
  if (!person) {
    return {
      type: 'STOVE_UNATTENDED',
      severity: 'HIGH',
      message:
        'ALERT! Stove/fire is ON and left UNATTENDED! This is DANGEROUS! Please return to the kitchen immediately!',
      voiceAlert:
        'Warning! The stove is on and unattended! This is dangerous! Please return to the kitchen!',
      details: {
        stove_status: stoveState.status,
        stove_confidence: stoveState.confidence,
        person_detected: false,
        risk_level: 'HIGH - No supervision',
        action_required: 'Return to kitchen immediately',
      },
    };
  }

  const personDistance = distance(stove.center, person.center);
  if (personDistance <= config.safeDistanceThreshold) return null;

  const shown = Math.trunc(personDistance);
  return {
    type: 'STOVE_TOO_FAR',
    severity: 'MEDIUM',
    message: `WARNING: Stove is ON but you're too far away (${shown}px)! Stay close while cooking to prevent accidents!`,
    voiceAlert: 'Warning! You are too far from the active stove. Please stay close while cooking.',
    details: {
      stove_status: stoveState.status,
      distance_from_stove: shown,
      safe_distance: config.safeDistanceThreshold,
      person_detected: true,
      risk_level: 'MEDIUM - Too far from heat source',
    },
  };
};
