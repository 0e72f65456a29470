/**
 * Base Command Class for the unionmount CLI
 *
 * Provides dependency injection, the shared mount options and consistent
 * success/error output for every command.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import { collectValues } from '../services/mount-settings';
import type { BaseCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand, IExecutableCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();
  protected readonly logger = console;

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Adds `--config`, `--source`, `--pattern`, `--ignore` and the output flags.
   */
  protected withMountOptions(command: Command): Command {
    return command
      .option('-c, --config <file>', 'Mount configuration file (default: ./unionmount.yaml if present)')
      .option('-s, --source <name=dir>', 'Mount a directory under a source name (repeatable)', collectValues, [])
      .option('-p, --pattern <tag=glob>', 'Track files matching glob under tag, first match wins (repeatable)', collectValues, [])
      .option('-i, --ignore <glob>', 'Never track files matching glob (repeatable)', collectValues, [])
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Log every filesystem event')
      .option('--quiet', 'Suppress non-essential output');
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }
}
