import { z } from 'zod';
import { ClassifierHttpError, ClassifierResponseError, ClassifierTimeoutError, formatError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

const ANTHROPIC_VERSION = '2023-06-01';
const MAX_TOKENS = 4096;
const EXPONENTIAL_BACKOFF_BASE = 2;
const EXPONENTIAL_BACKOFF_MULTIPLIER_MS = 1000;
const DEFAULT_TIMEOUT_MS = 120_000;

const messagesResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })),
});

const verdictSchema = z.object({
  c: z.record(z.unknown()),
});

/** One verdict per commit; null where that element was malformed. */
export type BatchVerdicts = Array<Record<string, unknown> | null>;

export interface ClassifierClientOptions {
  apiKey: string;
  model: string;
  apiUrl: string;
  maxRetries: number;
  timeoutMs?: number;
  logger?: Logger;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function stripCodeFence(text: string): string {
  let trimmed = text.trim();
  if (trimmed.startsWith('```')) {
    const newline = trimmed.indexOf('\n');
    trimmed = newline === -1 ? '' : trimmed.slice(newline + 1);
    if (trimmed.endsWith('```')) trimmed = trimmed.slice(0, -3);
    trimmed = trimmed.trim();
  }
  return trimmed;
}

/**
 * Parses the model's text into one verdict per commit. A wrong overall shape
 * throws; a single malformed element becomes null.
 */
export function parseBatchResponse(text: string, expectedLength: number): BatchVerdicts {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (err) {
    throw new ClassifierResponseError(`Response is not JSON: ${formatError(err)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new ClassifierResponseError(`Expected array of ${expectedLength}, got ${typeof parsed}`);
  }
  if (parsed.length !== expectedLength) {
    throw new ClassifierResponseError(`Expected array of ${expectedLength}, got array of length ${parsed.length}`);
  }

  return parsed.map(element => {
    const verdict = verdictSchema.safeParse(element);
    return verdict.success ? verdict.data.c : null;
  });
}

export class ClassifierClient {
  private readonly opts: ClassifierClientOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: ClassifierClientOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Classifies one batch, retrying with exponential backoff (1s, 2s, 4s...).
   * Throws the last error once `maxRetries` attempts have failed.
   */
  async classifyBatch(systemPrompt: string, userMessage: string, expectedLength: number): Promise<BatchVerdicts> {
    const baseDelay = this.opts.baseDelayMs ?? EXPONENTIAL_BACKOFF_MULTIPLIER_MS;
    let lastError: unknown = new Error('classifier was not called');

    for (let attempt = 0; attempt < this.opts.maxRetries; attempt++) {
      try {
        const text = await this.requestOnce(systemPrompt, userMessage);
        return parseBatchResponse(text, expectedLength);
      } catch (err) {
        lastError = err;
        if (attempt < this.opts.maxRetries - 1) {
          const delay = Math.pow(EXPONENTIAL_BACKOFF_BASE, attempt) * baseDelay;
          this.logger.detail(`  retry ${attempt + 1} in ${delay}ms (${formatError(err)})`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }

  /** One request; aborted once `timeoutMs` passes, including the body read. */
  private async requestOnce(systemPrompt: string, userMessage: string): Promise<string> {
    const timeoutMs = this.opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.send(systemPrompt, userMessage, controller.signal);
    } catch (err) {
      if (controller.signal.aborted) throw new ClassifierTimeoutError(timeoutMs);
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async send(systemPrompt: string, userMessage: string, signal: AbortSignal): Promise<string> {
    const response = await fetch(this.opts.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.opts.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify({
        model: this.opts.model,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content: userMessage }],
      }),
      signal,
    });

    if (!response.ok) {
      throw new ClassifierHttpError(response.status, await response.text());
    }

    const body = messagesResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new ClassifierResponseError('Unexpected messages API response shape');
    }

    const block = body.data.content.find(b => b.type === 'text' && b.text !== undefined);
    if (!block?.text) {
      throw new ClassifierResponseError('No text content in API response');
    }
    return block.text;
  }
}
