import type { DecisionAction } from './types';

/** Tunables shared by the admission, aggregation and maintenance components. */
export interface AttentionConfig {
  /** Below this energy, messages without a wake signal are ignored. */
  energyFloor: number;
  energyCostPerCycle: number;
  energyDailyRecovery: number;
  energyRecoverySilenceMinutes: number;
  energyRecoveryStep: number;
  /** Passive recovery never lifts energy above this value. */
  energyRecoveryCeiling: number;
  moodDecayIntervalSeconds: number;
  moodDecayStep: number;
  debounceQuietPeriodSeconds: number;
  debounceMaxWindowSeconds: number;
  backgroundPoolCapacity: number;
  ambientContextCapacity: number;
  evictionTtlSeconds: number;
  maintenanceIntervalSeconds: number;
  classifierFailureDefault: DecisionAction;
  /** 0 disables the timeout. */
  classifierTimeoutMs: number;
  /** Lower-cased prefixes that are answered without asking the classifier. */
  shortcutPhrases: readonly string[];
}

export const DEFAULT_ATTENTION_CONFIG: AttentionConfig = {
  energyFloor: 0.1,
  energyCostPerCycle: 0.05,
  energyDailyRecovery: 0.2,
  energyRecoverySilenceMinutes: 60,
  energyRecoveryStep: 0.1,
  energyRecoveryCeiling: 0.8,
  moodDecayIntervalSeconds: 300,
  moodDecayStep: 0.1,
  debounceQuietPeriodSeconds: 2,
  debounceMaxWindowSeconds: 30,
  backgroundPoolCapacity: 20,
  ambientContextCapacity: 20,
  evictionTtlSeconds: 600,
  maintenanceIntervalSeconds: 60,
  classifierFailureDefault: 'REPLY',
  classifierTimeoutMs: 10_000,
  shortcutPhrases: [],
};

export const DEFAULT_ENERGY = 0.8;
export const DEFAULT_MOOD = 0;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Local calendar date formatted as `YYYY-MM-DD`. */
export function formatLocalDate(epochMs: number): string {
  const date = new Date(epochMs);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}
