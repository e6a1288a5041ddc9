import { afterEach, describe, expect, it, vi } from 'vitest';
import type { PetEvent } from '../../events/types';
import { createRecordingLogger } from '../../logger';
import { DEFAULT_STATS } from '../../stats/types';
import { ChatResponder } from '../chatResponder';
import { PET_INSTRUCTION } from '../contextBuilder';
import type { ChatReplyInput, ReplyModelClient, ReplyModelRequest } from '../types';

const input = (overrides: Partial<ChatReplyInput> = {}): ChatReplyInput => ({
  stats: { ...DEFAULT_STATS },
  recentEvents: [],
  lastUserText: ' hi ',
  timeOfDay: 'evening',
  ...overrides,
});

const clientFrom = (requestReply: (request: ReplyModelRequest) => Promise<unknown>) => {
  const spy = vi.fn(requestReply);
  const client: ReplyModelClient = { id: 'fake', requestReply: spy };
  return { client, spy };
};

describe('ChatResponder', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('uses the fallback directly when no model is configured', async () => {
    const responder = new ChatResponder({ client: null, logger: createRecordingLogger('chat') });

    await expect(responder.getReply(input({ stats: { ...DEFAULT_STATS, hunger: 10 }, lastUserText: '' }))).resolves.toEqual({
      reply: { say: 'so hungry...', action: 'EAT' },
      source: 'fallback',
      attempts: 0,
      notice: null,
      failure: null,
    });
  });

  it('returns a validated model reply with the built context', async () => {
    const { client, spy } = clientFrom(async () => ({ say: 'yay you came back', action: 'jump' }));
    const responder = new ChatResponder({ client, petName: 'Mochi', createRequestId: () => 'req-7' });
    const events = Array.from({ length: 8 }, (_, index): PetEvent => ({
      ts: Date.UTC(2024, 0, 1, 0, index),
      kind: 'SYSTEM',
      meta: {},
    }));

    const outcome = await responder.getReply(input({ recentEvents: events }));

    expect(outcome.reply).toEqual({ say: 'yay you came back', action: 'JUMP' });
    expect(outcome.source).toBe('model');
    expect(outcome.attempts).toBe(1);

    const request = spy.mock.calls[0][0];
    expect(request.instruction).toBe(PET_INSTRUCTION);
    expect(request.requestId).toBe('req-7');
    expect(request.timeoutMs).toBe(4000);
    expect(request.context.petName).toBe('Mochi');
    expect(request.context.lastUserText).toBe('hi');
    expect(request.context.timeOfDay).toBe('evening');
    expect(request.context.condition).toBe('okay');
    expect(request.context.recentEvents).toHaveLength(6);
  });

  it('retries after a transport failure', async () => {
    const logger = createRecordingLogger('chat');
    const { client, spy } = clientFrom(async () => '{"say":"back again","action":"WAVE"}');
    spy.mockRejectedValueOnce(new Error('boom'));
    const responder = new ChatResponder({ client, logger, retryDelayMs: 0 });

    const outcome = await responder.getReply(input());

    expect(outcome.source).toBe('model');
    expect(outcome.attempts).toBe(2);
    expect(spy).toHaveBeenCalledTimes(2);
    expect(logger.records).toEqual([
      {
        level: 'warn',
        scope: 'chat',
        message: 'model reply failed',
        payload: { provider: 'fake', attempt: 1, reason: 'transport', detail: 'boom' },
      },
    ]);
  });

  it('backs off exponentially between attempts', async () => {
    vi.useFakeTimers();
    const { client, spy } = clientFrom(async () => {
      throw new Error('offline');
    });
    const responder = new ChatResponder({
      client,
      logger: createRecordingLogger('chat'),
      maxAttempts: 3,
      retryDelayMs: 100,
      timeoutMs: 10_000,
    });

    const pending = responder.getReply(input());
    await vi.advanceTimersByTimeAsync(0);
    expect(spy).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(99);
    expect(spy).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(spy).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(199);
    expect(spy).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(spy).toHaveBeenCalledTimes(3);

    const outcome = await pending;
    expect(outcome.attempts).toBe(3);
    expect(outcome.failure?.reason).toBe('transport');
  });

  it('falls back with a notice after repeated malformed replies', async () => {
    const { client, spy } = clientFrom(async () => '{"say": "oops"');
    const responder = new ChatResponder({ client, logger: createRecordingLogger('chat'), retryDelayMs: 0 });

    const outcome = await responder.getReply(input({ lastUserText: '' }));

    expect(spy).toHaveBeenCalledTimes(2);
    expect(outcome.reply).toEqual({ say: 'feeling good!', action: 'SMILE' });
    expect(outcome.source).toBe('fallback');
    expect(outcome.attempts).toBe(2);
    expect(outcome.notice).toBe('Pet brain offline (malformed); using a simple reply.');
    expect(outcome.failure?.reason).toBe('malformed');
  });

  it('answers within the contract for boundary stats when the model keeps failing', async () => {
    const { client } = clientFrom(async () => {
      throw new Error('offline');
    });
    const responder = new ChatResponder({ client, logger: createRecordingLogger('chat'), maxAttempts: 1 });

    for (const value of [0, 100]) {
      const stats = { hunger: value, hygiene: value, mood: value, energy: value, affection: value, health: value, sleeping: false };
      const outcome = await responder.getReply(input({ stats }));
      expect(outcome.source).toBe('fallback');
      expect(outcome.reply.say.length).toBeGreaterThan(0);
      expect(outcome.reply.say.split(' ').length).toBeLessThanOrEqual(12);
    }
  });

  it('rejects actions outside the set as malformed', async () => {
    const { client } = clientFrom(async () => ({ say: 'hi', action: 'DANCE' }));
    const responder = new ChatResponder({ client, logger: createRecordingLogger('chat'), maxAttempts: 1 });

    const outcome = await responder.getReply(input());

    expect(outcome.source).toBe('fallback');
    expect(outcome.failure?.reason).toBe('malformed');
  });

  it('aborts a model call that runs past the timeout', async () => {
    const seen: { signal: AbortSignal | null } = { signal: null };
    const { client } = clientFrom(
      (request) =>
        new Promise<unknown>(() => {
          seen.signal = request.signal;
        })
    );
    const responder = new ChatResponder({
      client,
      logger: createRecordingLogger('chat'),
      timeoutMs: 20,
      maxAttempts: 1,
    });

    const outcome = await responder.getReply(input());

    expect(outcome.source).toBe('fallback');
    expect(outcome.attempts).toBe(1);
    expect(outcome.failure?.reason).toBe('timeout');
    expect(outcome.notice).toBe('Pet brain offline (timeout); using a simple reply.');
    expect(seen.signal?.aborted).toBe(true);
  });
});
