import {
  DEFAULT_DECAY_RULES,
  DEFAULT_STATS,
  STAT_MAX,
  STAT_MIN,
  STAT_NAMES,
  type DecayRules,
  type DecayTickResult,
  type PetStats,
  type RandomSource,
  type StatEffects,
  type StatName,
  type StatValues,
} from './types';

const clamp = (value: number, min: number, max: number): number => {
  return Math.max(min, Math.min(max, value));
};

// Two decimal places keep 0.5 / 0.2 steps exact across long catch-up runs.
export const toFixedPoint = (value: number): number => {
  return Math.round(value * 100) / 100;
};

export const clampStat = (value: number): number => {
  if (!Number.isFinite(value)) return STAT_MIN;
  return toFixedPoint(clamp(value, STAT_MIN, STAT_MAX));
};

export class StatSet {
  private readonly values: StatValues;
  private asleep: boolean;

  constructor(initial: Partial<PetStats> = {}) {
    const merged: PetStats = { ...DEFAULT_STATS, ...initial };
    this.values = {
      hunger: clampStat(merged.hunger),
      hygiene: clampStat(merged.hygiene),
      mood: clampStat(merged.mood),
      energy: clampStat(merged.energy),
      affection: clampStat(merged.affection),
      health: clampStat(merged.health),
    };
    this.asleep = merged.sleeping;
  }

  get sleeping(): boolean {
    return this.asleep;
  }

  set sleeping(value: boolean) {
    this.asleep = value;
  }

  get(stat: StatName): number {
    return this.values[stat];
  }

  applyDelta(stat: StatName, amount: number): number {
    this.values[stat] = clampStat(this.values[stat] + amount);
    return this.values[stat];
  }

  /** Applies every delta and returns the change that actually landed after clamping. */
  applyEffects(effects: StatEffects): StatEffects {
    const applied: StatEffects = {};
    for (const stat of STAT_NAMES) {
      const delta = effects[stat];
      if (delta === undefined) continue;
      const before = this.values[stat];
      applied[stat] = toFixedPoint(this.applyDelta(stat, delta) - before);
    }
    return applied;
  }

  decayTick(awake: boolean, random: RandomSource, rules: DecayRules = DEFAULT_DECAY_RULES): DecayTickResult {
    this.applyDelta('hunger', -rules.hungerPerMinute);
    this.applyDelta('hygiene', -rules.hygienePerMinute);
    if (awake) {
      this.applyDelta('energy', -rules.energyAwakePerMinute);
    } else {
      this.applyDelta('energy', rules.energySleepingRecoveryPerMinute);
    }

    if (this.isCritical('hunger', rules.lowNeedThreshold) || this.isCritical('hygiene', rules.lowNeedThreshold)) {
      this.applyDelta('mood', -rules.moodPenaltyPerMinute);
    }

    const critical =
      this.isCritical('hunger', rules.criticalHungerThreshold) ||
      this.isCritical('hygiene', rules.criticalHygieneThreshold) ||
      this.isCritical('energy', rules.criticalEnergyThreshold);

    if (critical && random() < rules.sicknessChance) {
      this.applyDelta('health', -rules.sicknessHealthLoss);
      return { sick: true };
    }

    return { sick: false };
  }

  isCritical(stat: StatName, threshold: number): boolean {
    return this.values[stat] < threshold;
  }

  snapshot(): PetStats {
    return { ...this.values, sleeping: this.asleep };
  }

  /** Rebuilds a stat set from stored values, clamping anything out of range. */
  static fromSnapshot(stored: Partial<PetStats>): StatSet {
    return new StatSet(stored);
  }
}
