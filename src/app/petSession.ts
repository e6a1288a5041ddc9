import {
  ChatResponder,
  createConsoleLogger,
  greetingReply,
  InvalidStateError,
  PersistenceManager,
  PetEngine,
  timeOfDayLabel,
  type AutosaveHandle,
  type CatchUpResult,
  type ChatReplyOutcome,
  type CommandResult,
  type EngineRules,
  type ItemCatalog,
  type LoadResult,
  type PetLogger,
  type PetReply,
  type PetSnapshot,
  type PetStatusView,
  type RandomSource,
  type ReplyModelClient,
} from '@pocket-pet/core';
import type { PetConfig } from '../config/petConfig';
import { loadItemCatalogFile } from '../config/itemSource';
import { resolveReplyClient } from '../providers/registry';
import { createPetStore, type PetStore } from '../store/petStore';

export type SleepMode = 'on' | 'off';

export interface PetSessionOptions {
  config: PetConfig;
  /** Read from data/items.yaml when omitted. */
  catalog?: ItemCatalog;
  /** Resolved from the config when omitted; null keeps every reply deterministic. */
  client?: ReplyModelClient | null;
  persistence?: PersistenceManager;
  store?: PetStore;
  logger?: PetLogger;
  random?: RandomSource;
  clock?: () => number;
  rules?: Partial<EngineRules>;
  chatRetryDelayMs?: number;
}

/**
 * The command surface a UI drives. Wires the engine to persistence and chat and mirrors the
 * results into a vanilla zustand store the UI subscribes to.
 */
export class PetSession {
  readonly config: PetConfig;
  readonly store: PetStore;
  private readonly logger: PetLogger;
  private readonly clock: () => number;
  private readonly persistence: PersistenceManager;
  private readonly responder: ChatResponder;
  private readonly options: PetSessionOptions;
  private engine: PetEngine | null = null;
  private catalog: ItemCatalog | null;
  private autosaveHandle: AutosaveHandle | null = null;

  constructor(options: PetSessionOptions) {
    this.options = options;
    this.config = options.config;
    this.store = options.store ?? createPetStore();
    this.logger = options.logger ?? createConsoleLogger('session');
    this.clock = options.clock ?? (() => Date.now());
    this.catalog = options.catalog ?? null;
    this.persistence =
      options.persistence ??
      new PersistenceManager({
        logger: this.logger,
        clock: this.clock,
        onAutosave: (error) => {
          if (error) {
            this.store.getState().pushNotice('error', `Autosave failed: ${error.message}`, this.clock());
          }
        },
      });

    const client = options.client === undefined ? resolveReplyClient(options.config) : options.client;
    this.responder = new ChatResponder({
      client,
      petName: options.config.petName,
      timeoutMs: options.config.llmTimeoutMs,
      retryDelayMs: options.chatRetryDelayMs,
      logger: this.logger,
    });
  }

  get started(): boolean {
    return this.engine !== null;
  }

  async start(): Promise<LoadResult> {
    if (this.engine) {
      throw new InvalidStateError('Session already started');
    }

    const catalog = this.catalog ?? (await loadItemCatalogFile());
    this.catalog = catalog;
    const loaded = await this.persistence.load(this.config.savePath);
    this.engine = this.createEngine(loaded.snapshot);

    const { pushNotice, setLoadSource } = this.store.getState();
    setLoadSource(loaded.source);
    if (loaded.source === 'backup') {
      pushNotice('warning', 'Save file was damaged; restored your pet from the backup.', this.clock());
    } else if (loaded.recovered) {
      pushNotice('error', 'Save file was unreadable; a new pet has been created.', this.clock());
    }

    this.logger.info('session started', {
      source: loaded.source,
      model: this.responder.modelId,
      items: catalog.size,
    });

    this.tick();
    this.startAutosave();
    if (loaded.source === 'defaults') {
      this.greet();
    }
    return loaded;
  }

  feed(itemId?: string): CommandResult {
    return this.runCommand((engine, now) => engine.feed(itemId, now));
  }

  clean(itemId?: string): CommandResult {
    return this.runCommand((engine, now) => engine.clean(itemId, now));
  }

  play(itemId?: string): CommandResult {
    return this.runCommand((engine, now) => engine.play(itemId, now));
  }

  sleep(mode: SleepMode): CommandResult {
    return this.runCommand((engine, now) => engine.sleep(mode === 'on', now));
  }

  pet(): CommandResult {
    return this.runCommand((engine, now) => engine.pet(now));
  }

  heal(): CommandResult {
    return this.runCommand((engine, now) => engine.heal(now));
  }

  vet(): CommandResult {
    return this.runCommand((engine, now) => engine.vet(now));
  }

  status(): PetStatusView {
    const status = this.requireEngine().status(this.clock());
    this.store.getState().setStatus(status);
    return status;
  }

  save(): Promise<void> {
    return this.persistence.save(this.config.savePath, this.requireEngine().toSnapshot());
  }

  /** Advances decay to `now`; a UI calls this on its own timer. */
  tick(now: number = this.clock()): CatchUpResult {
    const engine = this.requireEngine();
    const result = engine.runCatchUp(now);
    const { pushNotice, setLastAction } = this.store.getState();

    if (result.action) {
      setLastAction(result.action);
      pushNotice('warning', 'Your pet is feeling sick.', now);
    }
    if (result.woke) {
      setLastAction('WAVE');
      pushNotice('info', 'Your pet woke up feeling rested.', now);
    }
    if (result.capped) {
      this.logger.info('catch-up capped', { minutes: result.minutes });
    }

    this.status();
    return result;
  }

  /**
   * Asks the pet something. Commands and ticks stay usable while the reply is pending; the
   * responder works on a copy of the stats taken here.
   */
  async chat(text: string): Promise<ChatReplyOutcome> {
    const engine = this.requireEngine();
    const asked = this.clock();
    const { appendChat, setThinking } = this.store.getState();

    appendChat({ at: asked, from: 'user', text });
    setThinking(true);

    let outcome: ChatReplyOutcome;
    try {
      outcome = await this.responder.getReply({
        stats: engine.status(asked).stats,
        recentEvents: engine.recentEvents(),
        lastUserText: text,
        timeOfDay: timeOfDayLabel(asked),
      });
    } finally {
      setThinking(false);
    }

    const now = this.clock();
    if (this.engine !== engine) {
      // The pet was reset while the reply was pending; it belongs to the old pet.
      this.logger.info('chat reply dropped after reset', { source: outcome.source });
      return outcome;
    }
    engine.recordChat(text, outcome.reply, outcome.source, now);

    const state = this.store.getState();
    state.appendChat({
      at: now,
      from: 'pet',
      text: outcome.reply.say,
      action: outcome.reply.action,
      source: outcome.source,
    });
    state.setLastAction(outcome.reply.action);
    if (outcome.notice) {
      state.pushNotice('warning', outcome.notice, now);
    }

    this.status();
    return outcome;
  }

  greet(): PetReply {
    const engine = this.requireEngine();
    const now = this.clock();
    const reply = greetingReply(engine.status(now).createdAt);
    engine.recordSystem({ greeting: reply.say, action: reply.action }, now);

    const { appendChat, setLastAction } = this.store.getState();
    appendChat({ at: now, from: 'pet', text: reply.say, action: reply.action });
    setLastAction(reply.action);
    this.status();
    return reply;
  }

  /** Discards the save and its backup and starts over with a new pet. */
  async reset(): Promise<PetSnapshot> {
    this.requireEngine();
    this.stopAutosave();

    const snapshot = await this.persistence.reset(this.config.savePath);
    this.engine = this.createEngine(snapshot);

    const { clear, setLoadSource } = this.store.getState();
    clear();
    setLoadSource('defaults');

    this.startAutosave();
    this.greet();
    return snapshot;
  }

  async shutdown(): Promise<void> {
    const engine = this.requireEngine();
    this.stopAutosave();
    await this.persistence.saveOnExit(this.config.savePath, () => engine.toSnapshot());
    this.logger.info('session saved on exit', { path: this.config.savePath });
  }

  private createEngine(snapshot: PetSnapshot): PetEngine {
    if (!this.catalog) {
      throw new InvalidStateError('Item catalog is not loaded');
    }
    return PetEngine.fromSnapshot(snapshot, {
      catalog: this.catalog,
      rules: { eventCapacity: this.config.eventCapacity, ...this.options.rules },
      random: this.options.random,
      clock: this.clock,
    });
  }

  private runCommand(command: (engine: PetEngine, now: number) => CommandResult): CommandResult {
    const now = this.clock();
    const result = command(this.requireEngine(), now);
    const { pushNotice, setLastAction } = this.store.getState();

    if (result.ok) {
      setLastAction(result.action);
    } else {
      pushNotice('warning', result.error.message, now);
    }

    this.status();
    return result;
  }

  private startAutosave(): void {
    this.autosaveHandle = this.persistence.autosave(this.config.savePath, this.config.autosaveIntervalS, () =>
      this.requireEngine().toSnapshot()
    );
  }

  private stopAutosave(): void {
    this.autosaveHandle?.stop();
    this.autosaveHandle = null;
  }

  private requireEngine(): PetEngine {
    if (!this.engine) {
      throw new InvalidStateError('Session has not been started');
    }
    return this.engine;
  }
}
