import type { Command } from 'commander';
import { ItemCommand } from './item_command';

export { ItemCommand } from './item_command';
export type { ItemDeleteOptions, ItemWriteOptions } from './item_command.types';

/**
 * Register item commands.
 */
export function registerItemCommands(program: Command): void {
  new ItemCommand().register(program);
}
