export interface SafetyConfig {
  /** Pixels a person may stand from an active stove. */
  safeDistanceThreshold: number;
  /** Detections below this confidence are invisible to every rule. */
  confidenceThreshold: number;
  alertCooldownSec: number;
  knifeDangerDistance: number;
}

/** On-disk / over-the-wire shape of {@link SafetyConfig}. */
export interface SafetyConfigFile {
  safe_distance_threshold: number;
  confidence_threshold: number;
  alert_cooldown: number;
  knife_danger_distance: number;
}
