import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CooldownError,
  createRecordingLogger,
  greetingReply,
  InvalidStateError,
  type ReplyModelClient,
} from '@pocket-pet/core';
import { readPetConfig } from '../../config/petConfig';
import { MockProvider } from '../../providers/mock/mockProvider';
import { PetSession } from '../petSession';

const T0 = new Date(2024, 4, 1, 10, 0).getTime();
const MINUTE = 60_000;

const exists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
};

describe('PetSession', () => {
  let dir: string;
  let savePath: string;
  let now: number;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pet-session-'));
    savePath = join(dir, 'save.json');
    now = T0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const createSession = (client: ReplyModelClient | null = null) =>
    new PetSession({
      config: readPetConfig({ PET_SAVE_PATH: savePath, PET_NAME: 'Mochi' }),
      client,
      logger: createRecordingLogger('session'),
      random: () => 0.99,
      clock: () => now,
      chatRetryDelayMs: 0,
    });

  it('greets a brand new pet', async () => {
    const session = createSession();
    const loaded = await session.start();
    const state = session.store.getState();

    expect(loaded.source).toBe('defaults');
    expect(loaded.fresh).toBe(true);
    expect(state.loadSource).toBe('defaults');
    expect(state.chatLog).toEqual([
      { at: T0, from: 'pet', text: greetingReply(T0).say, action: greetingReply(T0).action },
    ]);
    expect(state.lastAction).toBe(greetingReply(T0).action);
    expect(state.status?.recentEvents.map((event) => event.kind)).toEqual(['SYSTEM']);

    await session.shutdown();
  });

  it('refuses commands before it is started', () => {
    expect(() => createSession().feed()).toThrow(InvalidStateError);
  });

  it('applies commands and reports failures as notices', async () => {
    const session = createSession();
    await session.start();

    const fed = session.feed('kibble_small');
    expect(fed.ok).toBe(true);
    expect(session.store.getState().lastAction).toBe('EAT');
    expect(session.store.getState().status?.stats).toMatchObject({ hunger: 60, affection: 51 });

    now += 1_000;
    const again = session.feed('kibble_small');
    expect(again.ok ? null : again.error).toBeInstanceOf(CooldownError);
    expect(session.store.getState().notices.map((notice) => notice.level)).toEqual(['warning']);

    expect(session.sleep('on').ok).toBe(true);
    expect(session.play().ok).toBe(false);
    expect(session.sleep('off').ok).toBe(true);
    expect(session.pet().ok).toBe(true);
    expect(session.heal().ok).toBe(false);
    expect(session.vet().ok).toBe(true);

    await session.shutdown();
  });

  it('advances decay on tick', async () => {
    const session = createSession();
    await session.start();

    now += 10 * MINUTE;
    const result = session.tick();

    expect(result.minutes).toBe(10);
    expect(session.status().stats).toMatchObject({ hunger: 40, hygiene: 45, energy: 45 });

    await session.shutdown();
  });

  it('chats through the configured model', async () => {
    const client = new MockProvider({ replyByPrompt: { hello: { say: 'hi friend', action: 'HEART' } } });
    const session = createSession(client);
    await session.start();

    const outcome = await session.chat('Hello');
    const state = session.store.getState();

    expect(outcome.source).toBe('model');
    expect(state.thinking).toBe(false);
    expect(state.chatLog.slice(-2)).toEqual([
      { at: T0, from: 'user', text: 'Hello' },
      { at: T0, from: 'pet', text: 'hi friend', action: 'HEART', source: 'model' },
    ]);
    expect(state.lastAction).toBe('HEART');
    expect(state.status?.stats.affection).toBe(51);
    expect(state.status?.recentEvents.at(-1)?.kind).toBe('CHAT');

    await session.shutdown();
  });

  it('drops a reply that arrives after the pet was reset', async () => {
    let release: (value: unknown) => void = () => undefined;
    const client: ReplyModelClient = {
      id: 'slow',
      requestReply: () =>
        new Promise<unknown>((resolve) => {
          release = resolve;
        }),
    };
    const session = createSession(client);
    await session.start();

    const pending = session.chat('hello');
    await session.reset();
    release({ say: 'too late', action: 'WAVE' });
    const outcome = await pending;

    expect(outcome.source).toBe('model');
    expect(session.status().recentEvents.map((event) => event.kind)).toEqual(['SYSTEM']);
    expect(session.status().stats.affection).toBe(50);
    expect(session.store.getState().chatLog).toHaveLength(1);

    await session.shutdown();
  });

  it('shows a notice when the model is unreachable', async () => {
    const session = createSession(new MockProvider({ failureModes: ['network'] }));
    await session.start();

    const outcome = await session.chat('hello');

    expect(outcome.source).toBe('fallback');
    expect(session.store.getState().notices.at(-1)?.text).toBe(
      'Pet brain offline (transport); using a simple reply.'
    );

    await session.shutdown();
  });

  it('saves on shutdown and resumes from the save', async () => {
    const first = createSession();
    await first.start();
    first.feed('kibble_small');
    await first.shutdown();

    const second = createSession();
    const loaded = await second.start();

    expect(loaded.source).toBe('primary');
    expect(second.status().stats.hunger).toBe(60);
    expect(second.store.getState().chatLog).toEqual([]);

    await second.shutdown();
  });

  it('restores from the backup and tells the user', async () => {
    const first = createSession();
    await first.start();
    await first.save();
    first.feed('kibble_small');
    await first.shutdown();

    const content = await readFile(savePath, 'utf8');
    await writeFile(savePath, content.slice(0, 30), 'utf8');

    const second = createSession();
    const loaded = await second.start();

    expect(loaded.source).toBe('backup');
    expect(second.status().stats.hunger).toBe(50);
    expect(second.store.getState().notices.map((notice) => notice.text)).toEqual([
      'Save file was damaged; restored your pet from the backup.',
    ]);

    await second.shutdown();
  });

  it('starts over on reset', async () => {
    const session = createSession();
    await session.start();
    session.feed('kibble_small');
    await session.save();

    const snapshot = await session.reset();

    expect(snapshot.stats.hunger).toBe(50);
    expect(await exists(savePath)).toBe(false);
    expect(session.status().stats.hunger).toBe(50);
    expect(session.store.getState().chatLog).toHaveLength(1);
    expect(session.store.getState().loadSource).toBe('defaults');

    await session.shutdown();
    expect(await exists(savePath)).toBe(true);
  });
});
