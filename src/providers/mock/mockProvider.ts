import type { PetReply, ReplyModelRequest } from '@pocket-pet/core';
import type { ReplyProvider } from '../types';

export type MockFailureMode = 'none' | 'network' | 'hang' | 'malformed';

export interface MockProviderOptions {
  latencyMs?: number;
  defaultReply?: PetReply;
  replyByPrompt?: Record<string, PetReply>;
  /** Applied to successive calls; the last entry repeats. */
  failureModes?: MockFailureMode[];
}

const wait = async (ms: number, signal: AbortSignal): Promise<void> => {
  if (ms <= 0) return;
  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
};

const untilAborted = async (signal: AbortSignal): Promise<never> => {
  return await new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
};

/**
 * In-process stand-in for a real model. Answers from a prompt table and can be told to fail.
 */
export class MockProvider implements ReplyProvider {
  readonly id = 'mock' as const;
  private readonly latencyMs: number;
  private readonly defaultReply: PetReply;
  private readonly replyByPrompt: Record<string, PetReply>;
  private readonly failureModes: MockFailureMode[];
  private calls = 0;

  constructor(options: MockProviderOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.defaultReply = options.defaultReply ?? { say: 'hello from the mock!', action: 'WAVE' };
    this.replyByPrompt = options.replyByPrompt ?? {};
    this.failureModes = options.failureModes ?? [];
  }

  get callCount(): number {
    return this.calls;
  }

  async requestReply(request: ReplyModelRequest): Promise<unknown> {
    const mode = this.nextMode();
    await wait(this.latencyMs, request.signal);

    switch (mode) {
      case 'network':
        throw new Error('network unreachable');
      case 'hang':
        return await untilAborted(request.signal);
      case 'malformed':
        return '{"say": "oops"';
      case 'none':
        break;
    }

    const prompt = request.context.lastUserText.trim().toLowerCase();
    const reply = this.replyByPrompt[prompt] ?? this.defaultReply;
    return JSON.stringify(reply);
  }

  private nextMode(): MockFailureMode {
    const index = Math.min(this.calls, this.failureModes.length - 1);
    this.calls += 1;
    return index >= 0 ? this.failureModes[index] : 'none';
  }
}
