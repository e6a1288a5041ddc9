import Ajv from 'ajv';

export const PET_ACTIONS = [
  'SMILE',
  'LAUGH',
  'BLUSH',
  'HEART',
  'WAVE',
  'WIGGLE',
  'JUMP',
  'EAT',
  'CLEAN',
  'PLAY',
  'NAP',
  'SLEEPING',
  'SAD',
  'CRY',
  'SICK',
  'HEAL',
  'CONFUSED',
  'THINK',
  'SURPRISED',
  'THANKS',
] as const;

export type PetAction = (typeof PET_ACTIONS)[number];

export interface PetReply {
  say: string;
  action: PetAction;
}

export type ReplySource = 'model' | 'fallback';

export const MAX_REPLY_WORDS = 12;
export const NEUTRAL_PHRASE = 'hi!';

export interface ReplyValidationError {
  path: string;
  message: string;
}

export type ReplyValidationResult =
  | { ok: true; reply: PetReply }
  | { ok: false; errors: ReplyValidationError[] };

// Shape only; the action enum is checked after normalizing case.
export const rawReplySchema = {
  type: 'object',
  required: ['say', 'action'],
  properties: {
    say: { type: 'string' },
    action: { type: 'string' },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRawReply = ajv.compile<{ say: string; action: string }>(rawReplySchema);

export const isPetAction = (value: string): value is PetAction => {
  return (PET_ACTIONS as ReadonlyArray<string>).includes(value);
};

export const truncateWords = (text: string, maxWords: number = MAX_REPLY_WORDS): string => {
  return text
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, maxWords)
    .join(' ');
};

/** Builds a reply that satisfies the contract from an already-trusted action. */
export const makeReply = (say: string, action: PetAction): PetReply => {
  const text = truncateWords(say);
  return {
    say: text.length > 0 ? text : NEUTRAL_PHRASE,
    action,
  };
};

export const validateReply = (raw: unknown): ReplyValidationResult => {
  if (!validateRawReply(raw)) {
    return {
      ok: false,
      errors: (validateRawReply.errors ?? []).map((error) => ({
        path: error.instancePath && error.instancePath.length > 0 ? error.instancePath : '/',
        message: error.message ?? 'invalid value',
      })),
    };
  }

  const action = raw.action.trim().toUpperCase();
  if (!isPetAction(action)) {
    return {
      ok: false,
      errors: [{ path: '/action', message: `must be one of ${PET_ACTIONS.join(', ')}` }],
    };
  }

  return { ok: true, reply: makeReply(raw.say, action) };
};

/** JSON text from a model, with or without a fenced code block around it. */
export const parseReplyText = (text: string): ReplyValidationResult => {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch (error) {
    return {
      ok: false,
      errors: [{ path: '/', message: error instanceof Error ? error.message : 'invalid JSON' }],
    };
  }

  return validateReply(parsed);
};
