export { centerOf, distance } from './geometry.js';
export { findBest, findAll, cropKey, classificationFor } from './detectionIndex.js';
export {
  HAZARD_RULES,
  PAN_ON_BURNER_DISTANCE,
  runRules,
  checkFireSmoke,
  checkKnifeUnattended,
  checkPanOverheating,
  checkStoveUnattended,
} from './rules/index.js';
export type { HazardRule, NamedRule } from './rules/index.js';
export { CooldownTracker } from './cooldown.js';
export { SafetyChecker, stampAlerts } from './safetyChecker.js';
export type { EvaluateOptions, SafetyCheckerOptions } from './safetyChecker.js';
export { overallStatus, SAFE_STATUS } from './status.js';
export {
  parseDetectionBatch,
  parseClassificationBatch,
  parseFrame,
  toObjectClass,
} from './validation.js';
export type { ParseResult, ParsedFrame } from './validation.js';
export {
  DEFAULT_SAFETY_CONFIG,
  loadSafetyConfig,
  parseSafetyConfig,
  toSafetyConfigFile,
} from './config.js';
export { InvalidFrameError, ConfigError } from './errors.js';
