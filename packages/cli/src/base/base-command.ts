/**
 * Base Command Class for the hookline CLI
 *
 * Provides the shared output options, error and success reporting, and
 * access to the endpoint factory.
 */

import { Command } from 'commander';
import { EndpointFactory } from '../services/endpoint-factory';
import type { BaseCommandOptions, ICompleteCommand, RepositorySlug } from '../interfaces/command';

const SLUG_PATTERN = /^([^/\s]+)\/([^/\s]+)$/;

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly endpoints = EndpointFactory.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Execute the main command action
   */
  abstract execute(options: TOptions): Promise<void>;

  /**
   * Adds --json, --verbose and --quiet to a command
   */
  protected withOutputOptions(command: Command): Command {
    return command
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors');
  }

  /**
   * Splits "owner/name"
   */
  protected parseSlug(slug: string): RepositorySlug {
    const match = SLUG_PATTERN.exec(slug);
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new Error(`Expected a repository as owner/name, got '${slug}'`);
    }
    return { owner: match[1], name: match[2] };
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
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Reports a failure caught while executing
   */
  protected handleFailure(error: unknown, options: TOptions): void {
    this.handleError(
      error instanceof Error ? error.message : String(error),
      options,
      error instanceof Error ? error : undefined
    );
  }

  /**
   * Handle successful output consistently
   *
   * @param data - JSON payload, also printed in text mode when no `text` is given
   * @param text - plain-text rendering for text mode
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, text?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (!isQuiet) {
      if (message) {
        console.log(`✅ ${message}`);
      }
      if (text !== undefined) {
        if (text) {
          console.log(text);
        }
      } else if (data) {
        console.log(data);
      }
    }
  }
}
