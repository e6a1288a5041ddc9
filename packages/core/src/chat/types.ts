import type { TimeOfDay } from '../engine/types';
import type { ModelUnavailableError } from '../errors';
import type { PetEvent } from '../events/types';
import type { PetReply, ReplySource } from '../reply/responseContract';
import type { PetStats } from '../stats/types';

export type PetCondition = 'terrible' | 'poor' | 'okay' | 'good' | 'great';

export interface ChatContextBundle {
  petName: string;
  stats: PetStats;
  condition: PetCondition;
  recentEvents: string[];
  lastUserText: string;
  timeOfDay: TimeOfDay;
}

export interface ReplyModelRequest {
  instruction: string;
  context: ChatContextBundle;
  timeoutMs: number;
  signal: AbortSignal;
  requestId: string;
}

/**
 * The language-model collaborator. Resolves with whatever the model produced (an object or JSON
 * text); the responder validates it. Rejects on transport failure.
 */
export interface ReplyModelClient {
  readonly id: string;
  requestReply(request: ReplyModelRequest): Promise<unknown>;
}

export interface ChatReplyInput {
  stats: PetStats;
  recentEvents: ReadonlyArray<PetEvent>;
  lastUserText: string;
  timeOfDay: TimeOfDay;
}

export interface ChatReplyOutcome {
  reply: PetReply;
  source: ReplySource;
  attempts: number;
  /** Advisory text for the UI when the model could not be used. */
  notice: string | null;
  failure: ModelUnavailableError | null;
}
