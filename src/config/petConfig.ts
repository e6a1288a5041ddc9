import { homedir } from 'node:os';
import { join } from 'node:path';
import type { ReplyProviderId } from '../providers/types';

export interface PetConfig {
  savePath: string;
  llmProvider: ReplyProviderId;
  llmModel: string;
  llmTimeoutMs: number;
  autosaveIntervalS: number;
  eventCapacity: number;
  petName: string;
  geminiApiKey: string | null;
}

type EnvLike = Record<string, string | undefined>;

export const DEFAULT_SAVE_PATH = join(homedir(), '.pocket-pet', 'save.json');

const normalize = (value: string | undefined): string => {
  if (!value) return '';
  return value.trim();
};

const readProvider = (value: string | undefined): ReplyProviderId => {
  const provider = normalize(value).toLowerCase();
  if (provider === 'gemini' || provider === 'google') return 'gemini';
  if (provider === 'mock') return 'mock';
  return 'deterministic';
};

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(normalize(value));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const readPetConfig = (env: EnvLike = process.env): PetConfig => {
  return {
    savePath: normalize(env.PET_SAVE_PATH) || DEFAULT_SAVE_PATH,
    llmProvider: readProvider(env.PET_LLM_PROVIDER),
    llmModel: normalize(env.PET_LLM_MODEL) || 'gemini-2.5-flash',
    llmTimeoutMs: readPositiveInt(env.PET_LLM_TIMEOUT_MS, 4_000),
    autosaveIntervalS: readPositiveInt(env.PET_AUTOSAVE_INTERVAL_S, 30),
    eventCapacity: readPositiveInt(env.PET_EVENT_CAPACITY, 200),
    petName: normalize(env.PET_NAME) || 'Pocket',
    geminiApiKey: normalize(env.GEMINI_API_KEY) || null,
  };
};
