/**
 * Standard Command Interface for the unionmount CLI
 *
 * All commands implement this interface so they can be registered the same
 * way and tested without a Commander program.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Options shared by every command that mounts sources
 */
export interface MountCommandOptions extends BaseCommandOptions {
  /** Path to a YAML/JSON mount configuration */
  config?: string;
  /** Repeated `name=dir` assignments */
  source?: string[];
  /** Repeated `tag=glob` assignments, in priority order */
  pattern?: string[];
  /** Repeated ignore globs */
  ignore?: string[];
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}
