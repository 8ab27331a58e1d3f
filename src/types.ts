import type { GeminiProviderConfig } from './lib/providers';

export type BaseProviderConfig = { name: string };

export type ProviderConfig = GeminiProviderConfig;

export type FailureKind = 'transport' | 'response-shape';

/**
 * Outcome of a single generation request. Failures are values, not exceptions,
 * so the caller decides how to surface them.
 */
export type GenerateResult =
  | { ok: true; text: string }
  | { ok: false; kind: FailureKind; reason: string };

export class UserError extends Error {
  constructor(
    message: string,
    public hint?: string,
  ) {
    super(message);
    this.name = 'UserError';
  }
}
