export const EVENT_KINDS = [
  'DECAY',
  'FEED',
  'CLEAN',
  'PLAY',
  'SLEEP',
  'WAKE',
  'HEAL',
  'VET',
  'CHAT',
  'SYSTEM',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export type EventMeta = Record<string, string | number | boolean | null>;

export interface PetEvent {
  ts: number;
  kind: EventKind;
  meta: EventMeta;
}

export const DEFAULT_EVENT_CAPACITY = 200;
export const CHAT_CONTEXT_EVENTS = 6;

export const isEventKind = (value: string): value is EventKind => {
  return (EVENT_KINDS as ReadonlyArray<string>).includes(value);
};
