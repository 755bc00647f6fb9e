/**
 * Base Command Class for the catalog-submissions CLI
 *
 * Provides common functionality and enforces output standards across all commands.
 */

import type { Command } from 'commander';
import type { Logger } from '@catalog-submissions/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Core log level for this invocation. JSON output must stay parseable,
   * so only --verbose lets logs through next to it.
   */
  protected logLevelFor(options: BaseCommandOptions): Logger.LogLevel {
    if (options.verbose) return 'debug';
    if (options.quiet || options.json) return 'silent';
    return 'warn';
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
   * Handle successful output consistently
   * @param details - Human-readable lines printed under the message
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, details: string[] = []): void {
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
      for (const line of details) {
        console.log(line);
      }
    }
  }
}
