import type { AlertType } from '@hearthwatch/shared';

/**
 * Last-emission clock per alert type. The owning SafetyChecker is its only
 * writer; it lives as long as that checker does.
 */
export class CooldownTracker {
  private lastEmitted = new Map<AlertType, number>();
  private cooldownMs: number;

  constructor(cooldownSec: number) {
    this.cooldownMs = cooldownSec * 1000;
  }

  /** Records an emission and returns true when `type` is outside its window. */
  tryEmit(type: AlertType, nowMs: number): boolean {
    const last = this.lastEmitted.get(type);
    if (last !== undefined && nowMs - last < this.cooldownMs) {
      return false;
    }
    this.lastEmitted.set(type, nowMs);
    return true;
  }

  reset(): void {
    this.lastEmitted.clear();
  }
}
