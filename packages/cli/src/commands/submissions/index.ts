import type { Command } from 'commander';
import { SubmissionsCommand } from './submissions_command';

export { SubmissionsCommand } from './submissions_command';
export type { SubmissionsListOptions } from './submissions_command.types';

/**
 * Register submissions commands.
 */
export function registerSubmissionsCommands(program: Command): void {
  new SubmissionsCommand().register(program);
}
