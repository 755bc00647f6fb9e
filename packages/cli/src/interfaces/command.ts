/**
 * Standard Command Interface for the catalog-submissions CLI
 *
 * All commands implement this interface so registration stays uniform and
 * commands can be tested without a Commander program.
 */

import type { Command } from 'commander';

/**
 * Base options that all commands should support
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
