import { UserError } from '../../../types';
import type { BaseProviderConfig, GenerateResult } from '../../../types';
import { IAiProvider } from '../provider.interface';
import { CANDIDATE_TEXT_PATH } from './gemini-provider.types';
import type { ExtractResult, GeminiRequest } from './gemini-provider.types';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash-preview-05-20';

/** Largest delay Node timers accept; longer values fire immediately or throw. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface GeminiProviderConfig extends BaseProviderConfig {
  name: 'gemini';
  apiKey: string;
  model: string;
  /** Abort the request after this many milliseconds. Unset waits indefinitely. */
  timeoutMs?: number;
}

export class GeminiProvider extends IAiProvider<GeminiProviderConfig> {
  private baseUrl = 'https://generativelanguage.googleapis.com/v1beta';

  get displayName(): string {
    return 'Gemini';
  }

  public validateConfig(): void {
    if (!this.config.apiKey) {
      throw new UserError('Gemini API key not configured', 'Set the API_KEY environment variable.');
    }

    if (!this.config.model) {
      throw new UserError(
        'Gemini model not specified',
        `Pass a model like "${DEFAULT_GEMINI_MODEL}" with --model`,
      );
    }

    const { timeoutMs } = this.config;
    if (
      timeoutMs !== undefined &&
      (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS)
    ) {
      throw new UserError(
        `Invalid timeout: ${timeoutMs}`,
        `Use a positive number of milliseconds up to ${MAX_TIMEOUT_MS}`,
      );
    }
  }

  async executePrompt(prompt: string): Promise<GenerateResult> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent?key=${encodeURIComponent(this.config.apiKey)}`;

    const request: GeminiRequest = {
      contents: [
        {
          parts: [
            {
              text: prompt,
            },
          ],
        },
      ],
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.config.apiKey,
        },
        body: JSON.stringify(request),
        signal:
          this.config.timeoutMs !== undefined ? AbortSignal.timeout(this.config.timeoutMs) : undefined,
      });
    } catch (error: unknown) {
      return { ok: false, kind: 'transport', reason: this.describeRequestError(error) };
    }

    if (!response.ok) {
      return { ok: false, kind: 'transport', reason: await this.describeErrorResponse(response) };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      const reason =
        error instanceof SyntaxError
          ? `Response body is not valid JSON: ${error.message}`
          : this.describeRequestError(error);
      return { ok: false, kind: 'transport', reason };
    }

    const extracted = extractCandidateText(body);
    if (!extracted.ok) {
      return { ok: false, kind: 'response-shape', reason: extracted.reason };
    }

    return { ok: true, text: extracted.text };
  }

  private describeRequestError(error: unknown): string {
    if (isTimeoutError(error)) {
      return `Request timed out after ${this.config.timeoutMs}ms`;
    }

    if (error instanceof Error) {
      // undici reports the socket-level failure (ECONNREFUSED, ENOTFOUND, ...) as the cause
      return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
    }

    return String(error);
  }

  private async describeErrorResponse(response: Response): Promise<string> {
    const status = response.status;
    let message = response.statusText ? `HTTP ${status} ${response.statusText}` : `HTTP ${status}`;

    // Gemini puts the useful part in { error: { message } }
    const errorBody = tryParseJson(await response.text().catch(() => ''));
    if (isRecord(errorBody)) {
      const apiError = errorBody.error;
      if (isRecord(apiError) && typeof apiError.message === 'string' && apiError.message) {
        message = `${message}: ${apiError.message}`;
      }
    }

    const hint = this.getErrorHint(status);
    return hint ? `${message} (${hint})` : message;
  }

  private getErrorHint(status: number): string | undefined {
    const hints: Record<number, string> = {
      400: 'check the model name and request parameters',
      401: 'check the API_KEY environment variable',
      403: 'ensure the API key has the necessary permissions',
      404: `model '${this.config.model}' may not exist`,
      429: 'rate limit exceeded, wait a moment and try again',
      500: 'the service may be temporarily down, try again later',
      502: 'the service may be temporarily down, try again later',
      503: 'the service may be temporarily down, try again later',
    };

    return hints[status];
  }
}

/**
 * Reads `candidates[0].content.parts[0].text` from an untrusted response body.
 * The failure reason names the first step of the path that was absent.
 */
export function extractCandidateText(body: unknown): ExtractResult {
  let current: unknown = body;
  let traversed = '';

  for (const segment of CANDIDATE_TEXT_PATH) {
    let next: unknown;
    if (typeof segment === 'number') {
      traversed = `${traversed}[${segment}]`;
      next = Array.isArray(current) ? current[segment] : undefined;
    } else {
      traversed = traversed ? `${traversed}.${segment}` : segment;
      next = isRecord(current) ? current[segment] : undefined;
    }

    if (next === undefined || next === null) {
      return { ok: false, reason: `Missing '${traversed}'.${describeBlockedPrompt(body, traversed)}` };
    }
    current = next;
  }

  if (typeof current !== 'string') {
    return { ok: false, reason: `Expected '${traversed}' to be a string, got ${typeof current}.` };
  }

  return { ok: true, text: current };
}

function describeBlockedPrompt(body: unknown, missing: string): string {
  if (missing !== 'candidates' || !isRecord(body)) {
    return '';
  }

  const feedback = body.promptFeedback;
  if (isRecord(feedback) && typeof feedback.blockReason === 'string') {
    return ` The prompt was blocked: ${feedback.blockReason}.`;
  }
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError'
  );
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
