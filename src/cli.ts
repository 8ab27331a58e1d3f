import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager } from './lib/config-manager';
import { ReadmeGenerator, buildReadmePrompt, formatResult } from './lib/readme-generator';
import { DEFAULT_GEMINI_MODEL, GeminiProvider, MAX_TIMEOUT_MS } from './lib/providers';
import { copyToClipboard } from './lib/utils';
import { UserError } from './types';

/** Exit code used with --fail-on-error when the API call or response parsing failed. */
export const GENERATION_FAILED_EXIT_CODE = 2;

interface GenerateCommandOptions {
  model: string;
  timeout?: number;
  dryRun?: boolean;
  copy?: boolean;
  failOnError?: boolean;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(
      `Expected a positive number of milliseconds up to ${MAX_TIMEOUT_MS}.`,
    );
  }
  return ms;
}

function readVersion(): string {
  const packageJson = JSON.parse(
    fs.readFileSync(path.join(__dirname, '../package.json'), 'utf-8'),
  ) as { version: string };
  return packageJson.version;
}

/**
 * Parses `argv`, runs the generation and resolves with the process exit code.
 */
export async function runCli(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let exitCode = 0;

  try {
    const program = new Command();

    program
      .name('readmegen')
      .description('Generate a README.md draft from a short project description')
      .version(readVersion())
      .argument('<description...>', 'A short, descriptive sentence about your project')
      .option('-m, --model <model>', 'Gemini model to use', DEFAULT_GEMINI_MODEL)
      .option('-t, --timeout <ms>', 'Abort the request after this many milliseconds', parseTimeout)
      .option('-d, --dry-run', 'Show the prompt without sending')
      .option('-c, --copy', 'Copy the generated README to clipboard')
      .option('--fail-on-error', `Exit with code ${GENERATION_FAILED_EXIT_CODE} when generation fails`)
      .exitOverride()
      .action(async (words: string[], options: GenerateCommandOptions) => {
        exitCode = await runGenerate(words.join(' '), options, env);
      });

    await program.parseAsync(argv);
  } catch (error) {
    // help, --version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    return handleError(error, env);
  }

  return exitCode;
}

async function runGenerate(
  description: string,
  options: GenerateCommandOptions,
  env: NodeJS.ProcessEnv,
): Promise<number> {
  try {
    if (options.dryRun) {
      console.log(chalk.dim('--- Prompt to be sent ---'));
      console.log(buildReadmePrompt(description));
      console.log(chalk.dim('--- End of prompt ---'));
      return 0;
    }

    const config = new ConfigManager(env).load({
      model: options.model,
      timeoutMs: options.timeout,
    });

    console.log('Generating README.md...');
    const generator = new ReadmeGenerator(new GeminiProvider(config));
    const result = await generator.generate(description);
    console.log(formatResult(result));

    if (!result.ok) {
      return options.failOnError ? GENERATION_FAILED_EXIT_CODE : 0;
    }

    if (options.copy) {
      copyToClipboard(result.text);
    }
    return 0;
  } catch (error) {
    return handleError(error, env);
  }
}

function handleError(error: unknown, env: NodeJS.ProcessEnv): number {
  if (error instanceof UserError) {
    console.log(`Error: ${error.message}`);
    if (error.hint) {
      console.log(chalk.yellow(`  💡 ${error.hint}`));
    }
    return 1;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  console.error(chalk.red('✖ Unexpected error:'), err.message);
  if (env.DEBUG) {
    console.error(err.stack);
  } else {
    console.error(chalk.dim('Run with DEBUG=1 for stack trace'));
  }
  return 1;
}
