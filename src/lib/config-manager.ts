import { UserError } from '../types';
import type { ProviderConfig } from '../types';
import { DEFAULT_GEMINI_MODEL } from './providers';

export const API_KEY_ENV_VAR = 'API_KEY';

export interface ConfigOverrides {
  model?: string;
  timeoutMs?: number;
}

export class ConfigManager {
  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Build the provider config from the environment and command-line overrides.
   */
  load(overrides: ConfigOverrides = {}): ProviderConfig {
    const config: ProviderConfig = {
      name: 'gemini',
      apiKey: this.env[API_KEY_ENV_VAR] ?? '',
      model: overrides.model ?? DEFAULT_GEMINI_MODEL,
      timeoutMs: overrides.timeoutMs,
    };

    this.validate(config);

    return config;
  }

  validate(config: ProviderConfig): void {
    if (!config.apiKey) {
      throw new UserError(
        `API key not found. Please set the '${API_KEY_ENV_VAR}' environment variable.`,
      );
    }

    if (!config.model.trim()) {
      throw new UserError('Model name cannot be empty', `Omit --model to use ${DEFAULT_GEMINI_MODEL}`);
    }
  }
}
