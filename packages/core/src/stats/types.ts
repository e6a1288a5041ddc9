export const STAT_NAMES = ['hunger', 'hygiene', 'mood', 'energy', 'affection', 'health'] as const;

export type StatName = (typeof STAT_NAMES)[number];

export type StatValues = Record<StatName, number>;

export interface PetStats extends StatValues {
  sleeping: boolean;
}

export type StatEffects = Partial<Record<StatName, number>>;

export const STAT_MIN = 0;
export const STAT_MAX = 100;

export const DEFAULT_STATS: Readonly<PetStats> = {
  hunger: 50,
  hygiene: 50,
  mood: 50,
  energy: 50,
  affection: 50,
  health: 100,
  sleeping: false,
};

export interface DecayRules {
  hungerPerMinute: number;
  hygienePerMinute: number;
  energyAwakePerMinute: number;
  energySleepingRecoveryPerMinute: number;
  lowNeedThreshold: number;
  moodPenaltyPerMinute: number;
  criticalHungerThreshold: number;
  criticalHygieneThreshold: number;
  criticalEnergyThreshold: number;
  sicknessChance: number;
  sicknessHealthLoss: number;
}

export const DEFAULT_DECAY_RULES: Readonly<DecayRules> = {
  hungerPerMinute: 1,
  hygienePerMinute: 0.5,
  energyAwakePerMinute: 0.5,
  energySleepingRecoveryPerMinute: 1,
  lowNeedThreshold: 40,
  moodPenaltyPerMinute: 0.2,
  criticalHungerThreshold: 20,
  criticalHygieneThreshold: 20,
  criticalEnergyThreshold: 10,
  sicknessChance: 0.05,
  sicknessHealthLoss: 3,
};

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

export interface DecayTickResult {
  sick: boolean;
}

export const isStatName = (value: string): value is StatName => {
  return (STAT_NAMES as ReadonlyArray<string>).includes(value);
};
