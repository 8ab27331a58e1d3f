import type { BaseProviderConfig, GenerateResult } from '../../types';

export abstract class IAiProvider<Config extends BaseProviderConfig = BaseProviderConfig> {
  constructor(protected config: Config) {}

  abstract get displayName(): string;

  /**
   * Sends the prompt and resolves with the generated text or a described failure.
   * Implementations must not reject for transport or response problems.
   */
  abstract executePrompt(prompt: string): Promise<GenerateResult>;

  abstract validateConfig(): void;
}
