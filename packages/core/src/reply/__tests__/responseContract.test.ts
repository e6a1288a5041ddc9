import { describe, expect, it } from 'vitest';
import { makeReply, parseReplyText, PET_ACTIONS, validateReply } from '../responseContract';

describe('responseContract', () => {
  it('has twenty actions', () => {
    expect(PET_ACTIONS).toHaveLength(20);
    expect(new Set(PET_ACTIONS).size).toBe(20);
  });

  it('normalizes the action case', () => {
    expect(validateReply({ say: 'hello there', action: ' smile ' })).toEqual({
      ok: true,
      reply: { say: 'hello there', action: 'SMILE' },
    });
  });

  it('truncates long text to twelve words', () => {
    const result = validateReply({
      say: 'one two three four five six seven eight nine ten eleven twelve thirteen fourteen',
      action: 'THINK',
    });

    expect(result.ok && result.reply.say).toBe('one two three four five six seven eight nine ten eleven twelve');
  });

  it('substitutes a neutral phrase for empty text', () => {
    expect(makeReply('   ', 'WAVE')).toEqual({ say: 'hi!', action: 'WAVE' });
  });

  it('rejects actions outside the set and missing fields', () => {
    const unknown = validateReply({ say: 'hi', action: 'DANCE' });
    expect(unknown.ok).toBe(false);
    expect(!unknown.ok && unknown.errors[0].path).toBe('/action');

    expect(validateReply({ say: 'hi' }).ok).toBe(false);
    expect(validateReply({ say: 3, action: 'SMILE' }).ok).toBe(false);
    expect(validateReply('SMILE').ok).toBe(false);
  });

  it('parses fenced JSON text', () => {
    expect(parseReplyText('```json\n{"say":"yum","action":"eat"}\n```')).toEqual({
      ok: true,
      reply: { say: 'yum', action: 'EAT' },
    });
  });

  it('reports invalid JSON at the root', () => {
    const result = parseReplyText('{"say": "oops"');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.errors[0].path).toBe('/');
  });
});
