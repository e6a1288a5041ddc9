import { v4 as uuidv4 } from 'uuid';
import { ModelUnavailableError, type ModelFailureReason } from '../errors';
import { createConsoleLogger, type PetLogger } from '../logger';
import {
  parseReplyText,
  validateReply,
  type PetReply,
  type ReplyValidationResult,
} from '../reply/responseContract';
import { buildChatContext, PET_INSTRUCTION } from './contextBuilder';
import { fallbackReply } from './fallback';
import type { ChatContextBundle, ChatReplyInput, ChatReplyOutcome, ReplyModelClient } from './types';

const DEFAULT_TIMEOUT_MS = 4_000;
const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY_MS = 250;

export interface ChatResponderOptions {
  /** null means no model is configured; every reply comes from the fallback. */
  client: ReplyModelClient | null;
  petName?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: PetLogger;
  createRequestId?: () => string;
}

class ReplyTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Model did not answer within ${timeoutMs}ms`);
    this.name = 'ReplyTimeoutError';
  }
}

class MalformedReplyError extends Error {
  constructor(result: Extract<ReplyValidationResult, { ok: false }>) {
    super(`Malformed reply: ${result.errors.map((error) => `${error.path} ${error.message}`).join('; ')}`);
    this.name = 'MalformedReplyError';
  }
}

const wait = async (ms: number): Promise<void> => {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
};

const classify = (error: unknown): ModelFailureReason => {
  if (error instanceof ReplyTimeoutError) return 'timeout';
  if (error instanceof MalformedReplyError) return 'malformed';
  return 'transport';
};

const raceTimeout = async <T>(
  promise: Promise<T>,
  controller: AbortController,
  timeoutMs: number
): Promise<T> => {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      reject(new ReplyTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
};

/**
 * Turns chat text into a validated reply. Side-effect free apart from the model call: the caller
 * records the CHAT event. Never rejects; model trouble ends in the deterministic fallback.
 */
export class ChatResponder {
  private readonly client: ReplyModelClient | null;
  private readonly petName: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: PetLogger;
  private readonly createRequestId: () => string;

  constructor(options: ChatResponderOptions) {
    this.client = options.client;
    this.petName = options.petName ?? 'Pocket';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? createConsoleLogger('chat');
    this.createRequestId = options.createRequestId ?? (() => uuidv4());
  }

  get modelId(): string | null {
    return this.client?.id ?? null;
  }

  async getReply(input: ChatReplyInput): Promise<ChatReplyOutcome> {
    const context = buildChatContext(input, this.petName);

    if (!this.client) {
      return {
        reply: fallbackReply(context.stats, context.lastUserText),
        source: 'fallback',
        attempts: 0,
        notice: null,
        failure: null,
      };
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        await wait(this.retryDelayMs * 2 ** (attempt - 2));
      }

      try {
        const reply = await this.requestOnce(this.client, context);
        return { reply, source: 'model', attempts: attempt, notice: null, failure: null };
      } catch (error) {
        lastError = error;
        this.logger.warn('model reply failed', {
          provider: this.client.id,
          attempt,
          reason: classify(error),
          detail: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const failure = new ModelUnavailableError(classify(lastError), this.maxAttempts, lastError);
    return {
      reply: fallbackReply(context.stats, context.lastUserText),
      source: 'fallback',
      attempts: this.maxAttempts,
      notice: `Pet brain offline (${failure.reason}); using a simple reply.`,
      failure,
    };
  }

  private async requestOnce(client: ReplyModelClient, context: ChatContextBundle): Promise<PetReply> {
    const controller = new AbortController();
    const raw = await raceTimeout(
      client.requestReply({
        instruction: PET_INSTRUCTION,
        context,
        timeoutMs: this.timeoutMs,
        signal: controller.signal,
        requestId: this.createRequestId(),
      }),
      controller,
      this.timeoutMs
    );

    const result = typeof raw === 'string' ? parseReplyText(raw) : validateReply(raw);
    if (!result.ok) {
      throw new MalformedReplyError(result);
    }
    return result.reply;
  }
}
