import { CHAT_CONTEXT_EVENTS, type PetEvent } from '../events/types';
import { MAX_REPLY_WORDS, PET_ACTIONS } from '../reply/responseContract';
import type { PetStats } from '../stats/types';
import type { ChatContextBundle, ChatReplyInput, PetCondition } from './types';

export const PET_INSTRUCTION = [
  'You are a tiny, affectionate virtual pet who depends on the user for care.',
  'React to your stats, the recent events and what the user just said.',
  `Reply with at most ${MAX_REPLY_WORDS} words.`,
  `Pick exactly one action from: ${PET_ACTIONS.join(', ')}.`,
  'Use EAT when fed, CLEAN when washed, PLAY when entertained, SAD or CRY when neglected,',
  'NAP or SLEEPING when tired, SICK when unwell and THANKS when the user is kind.',
  'Return only a JSON object with the two fields "say" and "action".',
].join('\n');

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatEvent = (event: PetEvent): string => {
  const date = new Date(event.ts);
  const details = Object.entries(event.meta)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(' ');
  const stamp = `[${pad(date.getHours())}:${pad(date.getMinutes())}]`;
  return details ? `${stamp} ${event.kind} ${details}` : `${stamp} ${event.kind}`;
};

export const conditionFor = (stats: PetStats): PetCondition => {
  const average = (stats.hunger + stats.hygiene + stats.energy) / 3;
  if (average < 20) return 'terrible';
  if (average < 40) return 'poor';
  if (average < 60) return 'okay';
  if (average < 80) return 'good';
  return 'great';
};

export const buildChatContext = (input: ChatReplyInput, petName: string): ChatContextBundle => {
  return {
    petName,
    stats: { ...input.stats },
    condition: conditionFor(input.stats),
    recentEvents: input.recentEvents.slice(-CHAT_CONTEXT_EVENTS).map(formatEvent),
    lastUserText: input.lastUserText.trim(),
    timeOfDay: input.timeOfDay,
  };
};

export const renderContextPrompt = (context: ChatContextBundle): string => {
  const stats = context.stats;
  const payload = {
    current_stats: {
      hunger: Math.round(stats.hunger),
      hygiene: Math.round(stats.hygiene),
      mood: Math.round(stats.mood),
      energy: Math.round(stats.energy),
      affection: Math.round(stats.affection),
      health: Math.round(stats.health),
      sleeping: stats.sleeping,
    },
    overall_condition: context.condition,
    recent_events: context.recentEvents,
    last_user_said: context.lastUserText,
    time_of_day: context.timeOfDay,
    pet_name: context.petName,
  };

  return `CURRENT CONTEXT:\n${JSON.stringify(payload, null, 2)}\n\nRespond as ${context.petName}.`;
};
