import OpenAI from 'openai';
import { logger } from '../logger';
import { UpstreamError } from '../errors';
import type { ChatRole } from '@shared/schema';

export interface AssistantMessage {
  role: ChatRole;
  content: string;
}

/** The slice of the OpenAI SDK the assistant depends on. */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.Completions.ChatCompletion>;
    };
  };
}

export interface AssistantClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  /** Extra attempts after the first failure. */
  maxRetries: number;
  maxTokens?: number;
  temperature?: number;
  /** Injected completions API; built from apiKey when omitted. */
  api?: ChatCompletionsApi;
}

export class AssistantClient {
  private client: ChatCompletionsApi | null = null;
  private readonly options: AssistantClientOptions;

  constructor(options: AssistantClientOptions) {
    this.options = options;
    this.initializeClient();
  }

  private initializeClient() {
    if (this.options.api) {
      this.client = this.options.api;
      return;
    }

    if (!this.options.apiKey) {
      logger.warn('[Assistant] OPENAI_API_KEY not found - chat will be disabled');
      return;
    }

    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs,
      // Retries are handled here so the attempt count stays bounded.
      maxRetries: 0,
    });
    logger.info('[Assistant] Client initialized successfully');
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async complete(messages: AssistantMessage[]): Promise<string> {
    if (!this.client) {
      throw new UpstreamError('Assistant is not configured', 503);
    }

    const { model, maxRetries, maxTokens = 1000, temperature = 0.7 } = this.options;
    const attempts = 1 + Math.max(0, Math.min(maxRetries, 1));
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const startTime = Date.now();
      try {
        logger.info(`[Assistant] Sending chat request with ${messages.length} messages using ${model}`, { attempt });

        const completion = await this.client.chat.completions.create({
          model,
          messages,
          max_tokens: maxTokens,
          temperature,
          stream: false,
        });

        const response = completion.choices[0]?.message?.content;
        if (!response) {
          throw new Error('Empty completion');
        }

        logger.info(`[Assistant] Received response (${response.length} chars)`, {
          latencyMs: Date.now() - startTime,
        });
        return response;
      } catch (error) {
        lastError = error;
        logger.warn('[Assistant] Chat request failed', {
          attempt,
          latencyMs: Date.now() - startTime,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.error('[Assistant] Giving up after retries', lastError);
    throw new UpstreamError('Assistant provider unavailable');
  }
}
