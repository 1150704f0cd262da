/**
 * Standard Command Interface for the hookline CLI
 *
 * All commands implement this interface so they can be registered and
 * tested the same way.
 */

import { Command } from 'commander';

/**
 * Output options that every command supports
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
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
  /**
   * Execute the command with parsed arguments and options
   */
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }

/**
 * Repository named on the command line as "owner/name"
 */
export interface RepositorySlug {
  owner: string;
  name: string;
}
