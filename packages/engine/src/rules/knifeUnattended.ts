import { classificationFor, findBest } from '../detectionIndex.js';
import { distance } from '../geometry.js';
import { KNIFE_UNATTENDED, type HazardRule } from './types.js';

// A person within knifeDangerDistance vetoes the alert even when the
// classifier reports the knife as unattended.
export const checkKnifeUnattended: HazardRule = (detections, classifications, config) => {
  const knife = findBest(detections, 'knife', config.confidenceThreshold);
  if (!knife) return null;

  const knifeState = classificationFor(knife, classifications);
  if (knifeState?.status !== KNIFE_UNATTENDED) return null;

  const person = findBest(detections, 'person', config.confidenceThreshold);
  const personNearby =
    person !== undefined && distance(knife.center, person.center) < config.knifeDangerDistance;
  if (personNearby) return null;

  return {
    type: 'KNIFE_UNATTENDED',
    severity: 'MEDIUM',
    message:
      'WARNING: Knife is left unattended! This could be DANGEROUS! Please store the knife safely in a drawer or knife block.',
    voiceAlert: 'Warning! A knife is left unattended. This could be dangerous. Please store it safely.',
    details: {
      knife_status: knifeState.status,
      confidence: knifeState.confidence,
      features: knifeState.features,
      person_nearby: false,
      risk_level: 'MEDIUM - Sharp object unsecured',
      action_required: 'Store knife in drawer or knife block',
    },
  };
};
