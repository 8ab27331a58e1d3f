import chalk from 'chalk';
import clipboardy from 'clipboardy';

export function copyToClipboard(text: string, disableMessage = false): void {
  try {
    clipboardy.writeSync(text);
    if (!disableMessage) {
      console.error(chalk.green('✅ Copied to clipboard!'));
    }
  } catch (err) {
    console.error(chalk.yellow('Failed to copy:'), err instanceof Error ? err.message : err);
  }
}
