export type PetErrorCode =
  | 'unknown_item'
  | 'cooldown'
  | 'invalid_state'
  | 'not_needed'
  | 'catalog'
  | 'persistence_corrupt'
  | 'model_unavailable';

export abstract class PetError extends Error {
  abstract readonly code: PetErrorCode;
}

export class UnknownItemError extends PetError {
  readonly code = 'unknown_item';
  readonly itemId: string;

  constructor(itemId: string, message?: string) {
    super(message ?? `Unknown item: ${itemId}`);
    this.name = 'UnknownItemError';
    this.itemId = itemId;
  }
}

export class CooldownError extends PetError {
  readonly code = 'cooldown';
  readonly itemId: string;
  readonly remainingMs: number;

  constructor(itemId: string, remainingMs: number) {
    super(`${itemId} is on cooldown for another ${Math.ceil(remainingMs / 1000)}s`);
    this.name = 'CooldownError';
    this.itemId = itemId;
    this.remainingMs = remainingMs;
  }
}

export class InvalidStateError extends PetError {
  readonly code = 'invalid_state';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class NotNeededError extends PetError {
  readonly code = 'not_needed';

  constructor(message: string) {
    super(message);
    this.name = 'NotNeededError';
  }
}

export interface CatalogIssue {
  path: string;
  message: string;
}

export class CatalogError extends PetError {
  readonly code = 'catalog';
  readonly issues: CatalogIssue[];

  constructor(issues: CatalogIssue[]) {
    const summary = issues.map((issue) => `${issue.path} ${issue.message}`).join('; ');
    super(`Invalid item catalog: ${summary}`);
    this.name = 'CatalogError';
    this.issues = issues;
  }
}

export class PersistenceCorruptError extends PetError {
  readonly code = 'persistence_corrupt';
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Save file ${path} is unreadable: ${reason}`);
    this.name = 'PersistenceCorruptError';
    this.path = path;
    this.reason = reason;
  }
}

export type ModelFailureReason = 'timeout' | 'transport' | 'malformed';

export class ModelUnavailableError extends PetError {
  readonly code = 'model_unavailable';
  readonly reason: ModelFailureReason;
  readonly attempts: number;
  readonly causeValue: unknown;

  constructor(reason: ModelFailureReason, attempts: number, causeValue: unknown, message?: string) {
    super(message ?? `Model unavailable after ${attempts} attempt(s): ${reason}`);
    this.name = 'ModelUnavailableError';
    this.reason = reason;
    this.attempts = attempts;
    this.causeValue = causeValue;
  }
}

export type CommandError = UnknownItemError | CooldownError | InvalidStateError | NotNeededError;
