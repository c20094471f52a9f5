import { findBest } from '../detectionIndex.js';
import type { HazardRule } from './types.js';

/** Immediate-evacuation case. Fire wins over smoke when both are visible. */
export const checkFireSmoke: HazardRule = (detections, _classifications, config) => {
  const fire = findBest(detections, 'fire', config.confidenceThreshold);
  if (fire) {
    return {
      type: 'FIRE_DETECTED',
      severity: 'CRITICAL',
      message: 'DANGER DANGER DANGER! FIRE DETECTED IN KITCHEN! EVACUATE NOW AND CALL 911!',
      voiceAlert: 'Fire detected! Danger! Danger! Danger! Evacuate immediately!',
      details: {
        hazard: 'fire',
        confidence: fire.confidence,
        location: fire.center,
        action_required: 'EVACUATE AND CALL EMERGENCY SERVICES',
      },
    };
  }

  const smoke = findBest(detections, 'smoke', config.confidenceThreshold);
  if (smoke) {
    return {
      type: 'SMOKE_DETECTED',
      severity: 'CRITICAL',
      message: 'DANGER! SMOKE DETECTED! Possible fire hazard - check kitchen immediately!',
      voiceAlert: 'Smoke detected! Danger! Check the kitchen immediately!',
      details: {
        hazard: 'smoke',
        confidence: smoke.confidence,
        location: smoke.center,
        action_required: 'CHECK FOR FIRE SOURCE IMMEDIATELY',
      },
    };
  }

  return null;
};
