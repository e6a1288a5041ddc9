import { makeReply, type PetAction, type PetReply } from '../reply/responseContract';
import type { PetStats } from '../stats/types';

export const FALLBACK_THRESHOLDS = {
  hunger: 20,
  energy: 15,
  hygiene: 25,
} as const;

type FallbackBranch = 'hunger' | 'energy' | 'hygiene' | 'content';

const BRANCHES: Record<FallbackBranch, { action: PetAction; lines: readonly string[] }> = {
  hunger: { action: 'EAT', lines: ['so hungry...', 'need food!', 'tummy empty', 'snack please?'] },
  energy: { action: 'NAP', lines: ['so tired...', 'need a nap', 'zzz...', 'sleepy time'] },
  hygiene: { action: 'CLEAN', lines: ['need a wash!', 'feeling grubby', 'soap please?', 'bath time?'] },
  content: { action: 'SMILE', lines: ['feeling good!', 'hi there!', 'happy pet!', 'doing okay!'] },
};

const GREETINGS: ReadonlyArray<[string, PetAction]> = [
  ['hello human!', 'WAVE'],
  ['hi there!', 'SMILE'],
  ['new friend!', 'HEART'],
  ['wanna play?', 'WIGGLE'],
];

const hashText = (text: string): number => {
  let hash = 0;
  for (let index = 0; index < text.length; index += 1) {
    hash = (hash * 31 + text.charCodeAt(index)) | 0;
  }
  return Math.abs(hash);
};

export const selectFallbackBranch = (stats: PetStats): FallbackBranch => {
  if (stats.hunger < FALLBACK_THRESHOLDS.hunger) return 'hunger';
  if (stats.energy < FALLBACK_THRESHOLDS.energy) return 'energy';
  if (stats.hygiene < FALLBACK_THRESHOLDS.hygiene) return 'hygiene';
  return 'content';
};

/**
 * Stat-driven reply used when the model cannot answer. Same inputs always give the same reply.
 */
export const fallbackReply = (stats: PetStats, lastUserText = ''): PetReply => {
  const branch = BRANCHES[selectFallbackBranch(stats)];
  const line = branch.lines[hashText(lastUserText.trim().toLowerCase()) % branch.lines.length];
  return makeReply(line, branch.action);
};

export const greetingReply = (seed: string | number = ''): PetReply => {
  const [say, action] = GREETINGS[hashText(String(seed)) % GREETINGS.length];
  return makeReply(say, action);
};
