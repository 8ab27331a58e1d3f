import chalk from 'chalk';
import ora from 'ora';
import type { GenerateResult } from '../types';
import { TemplateEngine } from './template-engine';
import { README_PROMPT } from './prompts';
import { DEFAULT_GEMINI_MODEL, GeminiProvider } from './providers';
import type { IAiProvider } from './providers';

export interface GenerateOptions {
  model?: string;
  timeoutMs?: number;
}

export function buildReadmePrompt(description: string): string {
  return TemplateEngine.render(README_PROMPT, { description });
}

export class ReadmeGenerator {
  private provider: IAiProvider;

  constructor(provider: IAiProvider) {
    this.provider = provider;
    this.provider.validateConfig();
  }

  async generate(description: string): Promise<GenerateResult> {
    const prompt = buildReadmePrompt(description);

    // stderr keeps stdout limited to the README itself
    const spinner = ora({
      text: `Sending to ${this.provider.displayName}...`,
      stream: process.stderr,
    }).start();

    const result = await this.provider.executePrompt(prompt);

    if (result.ok) {
      spinner.succeed(chalk.green('Response received'));
    } else {
      spinner.fail(chalk.red('Request failed'));
    }

    return result;
  }
}

export function formatResult(result: GenerateResult): string {
  if (result.ok) {
    return result.text;
  }

  switch (result.kind) {
    case 'transport':
      return `Error connecting to the API: ${result.reason}`;
    case 'response-shape':
      return `Error parsing API response: The response structure is invalid. ${result.reason}`;
  }
}

/**
 * Generates README Markdown for `description`. Never rejects for network or
 * response problems; those come back as an error string.
 */
export async function generate(
  description: string,
  credential: string,
  options: GenerateOptions = {},
): Promise<string> {
  const provider = new GeminiProvider({
    name: 'gemini',
    apiKey: credential,
    model: options.model ?? DEFAULT_GEMINI_MODEL,
    timeoutMs: options.timeoutMs,
  });

  const result = await new ReadmeGenerator(provider).generate(description);
  return formatResult(result);
}
