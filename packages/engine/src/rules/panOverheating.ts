import { classificationFor, findBest } from '../detectionIndex.js';
import { distance } from '../geometry.js';
import { PAN_EMPTY, STOVE_ON, type HazardRule } from './types.js';

/** A pan whose center is closer than this to the stove's is on the burner. Not configurable. */
export const PAN_ON_BURNER_DISTANCE = 150;

export const checkPanOverheating: HazardRule = (detections, classifications, config) => {
  const pan = findBest(detections, 'pan', config.confidenceThreshold);
  const stove = findBest(detections, 'stove', config.confidenceThreshold);
  if (!pan || !stove) return null;

  const stoveState = classificationFor(stove, classifications);
  if (stoveState?.status !== STOVE_ON) return null;

  const panState = classificationFor(pan, classifications);
  if (panState?.status !== PAN_EMPTY) return null;

  const panStoveDistance = distance(pan.center, stove.center);
  if (panStoveDistance >= PAN_ON_BURNER_DISTANCE) return null;

  return {
    type: 'PAN_OVERHEATING',
    severity: 'HIGH',
    message:
      'DANGER! Empty pan on active stove! This can cause FIRE or damage! Add food/liquid or remove from heat!',
    voiceAlert: 'Danger! Empty pan on hot stove! Risk of fire! Please add contents or remove the pan!',
    details: {
      pan_status: panState.status,
      stove_status: stoveState.status,
      pan_stove_distance: Math.trunc(panStoveDistance),
      risk_level: 'HIGH - Fire hazard',
      action_required: 'Add contents to pan or remove from heat',
    },
  };
};
