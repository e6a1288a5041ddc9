import { GoogleGenAI, Type, type GenerateContentParameters } from '@google/genai';
import { PET_ACTIONS, renderContextPrompt, type ReplyModelRequest } from '@pocket-pet/core';
import type { ReplyProvider } from '../types';

const DEFAULT_REPLY_MODEL = 'gemini-2.5-flash';
const DEFAULT_MAX_OUTPUT_TOKENS = 64;
const DEFAULT_TEMPERATURE = 0.7;

export interface GenerateContentClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
  };
}

export interface GeminiProviderOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Injected in tests; built from the API key otherwise. */
  createClient?: (apiKey: string) => GenerateContentClient;
}

export const petReplySchema = {
  type: Type.OBJECT,
  properties: {
    say: { type: Type.STRING, description: 'Short, cute pet-like sentence of at most 12 words.' },
    action: { type: Type.STRING, enum: [...PET_ACTIONS] },
  },
  required: ['say', 'action'],
};

const defaultCreateClient = (apiKey: string): GenerateContentClient => new GoogleGenAI({ apiKey });

export class GeminiProvider implements ReplyProvider {
  readonly id = 'gemini' as const;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly createClient: (apiKey: string) => GenerateContentClient;
  private client: GenerateContentClient | null = null;

  constructor(options: GeminiProviderOptions = {}) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_REPLY_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.createClient = options.createClient ?? defaultCreateClient;
  }

  async requestReply(request: ReplyModelRequest): Promise<unknown> {
    const response = await this.resolveClient().models.generateContent({
      model: this.model,
      contents: [{ role: 'user', parts: [{ text: renderContextPrompt(request.context) }] }],
      config: {
        systemInstruction: request.instruction,
        responseMimeType: 'application/json',
        responseSchema: petReplySchema,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        thinkingConfig: { thinkingBudget: 0 },
        abortSignal: request.signal,
        httpOptions: { timeout: request.timeoutMs },
      },
    });

    const text = response.text?.trim() ?? '';
    if (!text) {
      throw new Error('Gemini returned an empty reply');
    }
    return text;
  }

  private resolveClient(): GenerateContentClient {
    const key = this.apiKey?.trim() ?? '';
    if (!key) {
      throw new Error('Missing Gemini API key');
    }
    if (!this.client) {
      this.client = this.createClient(key);
    }
    return this.client;
  }
}
