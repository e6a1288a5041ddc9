import type { ReplyModelClient } from '@pocket-pet/core';

export type ReplyProviderId = 'deterministic' | 'gemini' | 'mock';

/** A registered reply model. `deterministic` has no provider; it means no model at all. */
export interface ReplyProvider extends ReplyModelClient {
  readonly id: Exclude<ReplyProviderId, 'deterministic'>;
}
