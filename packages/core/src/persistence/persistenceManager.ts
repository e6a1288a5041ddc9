import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createDefaultSnapshot } from '../engine/petEngine';
import type { PetSnapshot } from '../engine/types';
import { PersistenceCorruptError } from '../errors';
import { createConsoleLogger, type PetLogger } from '../logger';
import { parseSnapshot, serializeSnapshot } from './snapshotFormat';

export type LoadSource = 'primary' | 'backup' | 'defaults';

export interface LoadResult {
  snapshot: PetSnapshot;
  source: LoadSource;
  /** No save existed; this is a brand new pet. */
  fresh: boolean;
  /** Data came from somewhere other than a healthy primary file. */
  recovered: boolean;
  errors: PersistenceCorruptError[];
}

export interface AutosaveHandle {
  stop(): void;
  readonly active: boolean;
}

export interface PersistenceManagerOptions {
  logger?: PetLogger;
  clock?: () => number;
  onAutosave?: (error: Error | null) => void;
}

type ReadOutcome =
  | { kind: 'missing' }
  | { kind: 'ok'; snapshot: PetSnapshot; content: string }
  | { kind: 'corrupt'; error: PersistenceCorruptError };

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

export const backupPathFor = (path: string): string => `${path}.bak`;
const tempPathFor = (path: string): string => `${path}.tmp`;

export class PersistenceManager {
  private readonly logger: PetLogger;
  private readonly clock: () => number;
  private readonly onAutosave?: (error: Error | null) => void;
  private queue: Promise<void> = Promise.resolve();
  private exitSave: Promise<void> | null = null;

  constructor(options: PersistenceManagerOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger('persistence');
    this.clock = options.clock ?? (() => Date.now());
    this.onAutosave = options.onAutosave;
  }

  async load(path: string): Promise<LoadResult> {
    const now = this.clock();
    const primary = await this.read(path, now);

    if (primary.kind === 'ok') {
      return { snapshot: primary.snapshot, source: 'primary', fresh: false, recovered: false, errors: [] };
    }

    if (primary.kind === 'missing') {
      this.logger.info('no save found, starting a new pet', { path });
      return { snapshot: createDefaultSnapshot(now), source: 'defaults', fresh: true, recovered: false, errors: [] };
    }

    this.logger.warn('save file is corrupt, trying backup', { path, reason: primary.error.reason });
    const backupPath = backupPathFor(path);
    const backup = await this.read(backupPath, now);

    if (backup.kind === 'ok') {
      this.logger.warn('restored pet from backup', { path: backupPath });
      return { snapshot: backup.snapshot, source: 'backup', fresh: false, recovered: true, errors: [primary.error] };
    }

    const errors = backup.kind === 'corrupt' ? [primary.error, backup.error] : [primary.error];
    this.logger.error('no readable save or backup, starting from defaults', {
      path,
      reason: errors.map((error) => error.reason).join(' | '),
    });
    return { snapshot: createDefaultSnapshot(now), source: 'defaults', fresh: false, recovered: true, errors };
  }

  /**
   * Writes atomically through a temp file. The previous primary becomes the backup, but only
   * when it was itself a readable save. The snapshot is serialized before this returns, so the
   * caller may keep mutating its live state while the write is in flight.
   */
  save(path: string, snapshot: PetSnapshot): Promise<void> {
    const content = serializeSnapshot(snapshot);
    const run = this.queue.then(() => this.write(path, content));
    // Keep the chain alive after a failed write; the failure still reaches this caller via `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  autosave(path: string, intervalS: number, getSnapshot: () => PetSnapshot): AutosaveHandle {
    let active = true;

    const tick = async (): Promise<void> => {
      try {
        await this.save(path, getSnapshot());
        this.onAutosave?.(null);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error('autosave failed', { path, reason: failure.message });
        this.onAutosave?.(failure);
      }
    };

    const timer = setInterval(() => {
      void tick();
    }, Math.max(1, intervalS) * 1000);
    timer.unref?.();

    return {
      stop: () => {
        active = false;
        clearInterval(timer);
      },
      get active() {
        return active;
      },
    };
  }

  /** Runs once per manager; later calls get the first call's promise. */
  saveOnExit(path: string, getSnapshot: () => PetSnapshot): Promise<void> {
    if (!this.exitSave) {
      this.exitSave = this.save(path, getSnapshot());
    }
    return this.exitSave;
  }

  async reset(path: string): Promise<PetSnapshot> {
    await this.queue;
    await rm(path, { force: true });
    await rm(backupPathFor(path), { force: true });
    this.logger.info('save discarded, new pet created', { path });
    return createDefaultSnapshot(this.clock());
  }

  private async read(path: string, now: number): Promise<ReadOutcome> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: 'missing' };
      }
      const reason = error instanceof Error ? error.message : String(error);
      return { kind: 'corrupt', error: new PersistenceCorruptError(path, reason) };
    }

    const parsed = parseSnapshot(content, now);
    if (!parsed.ok) {
      return { kind: 'corrupt', error: new PersistenceCorruptError(path, parsed.reason) };
    }
    return { kind: 'ok', snapshot: parsed.snapshot, content };
  }

  private async write(path: string, content: string): Promise<void> {
    const tempPath = tempPathFor(path);
    const backupPath = backupPathFor(path);
    const stagedBackupPath = tempPathFor(backupPath);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, content, 'utf8');

    const previous = await this.read(path, this.clock());
    if (previous.kind === 'ok') {
      await writeFile(stagedBackupPath, previous.content, 'utf8');
    } else if (previous.kind === 'corrupt') {
      this.logger.warn('previous save is corrupt, keeping the existing backup', {
        path,
        reason: previous.error.reason,
      });
    }

    await rename(tempPath, path);
    if (previous.kind === 'ok') {
      await rename(stagedBackupPath, backupPath);
    }
  }
}
