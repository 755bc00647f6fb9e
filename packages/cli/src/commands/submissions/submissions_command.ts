import type { Command } from 'commander';
import { ChangeDescriptor } from '@catalog-submissions/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { SubmissionsListOptions } from './submissions_command.types';

const STATUS_FILTERS = ChangeDescriptor.SUBMISSION_STATUSES.map(status => status.toLowerCase()).join(', ');

/** Case-insensitive match against the known statuses */
function parseStatusFilter(value: string): ChangeDescriptor.SubmissionStatus | undefined {
  return ChangeDescriptor.SUBMISSION_STATUSES.find(status => status.toLowerCase() === value.toLowerCase());
}

/**
 * SubmissionsCommand - submissions and their status, read back from pull requests.
 */
export class SubmissionsCommand extends BaseCommand<BaseCommandOptions> {

  register(program: Command): void {
    const submissions = program
      .command('submissions')
      .description('Inspect submitted catalog changes')
      .alias('s');

    // catalog-submissions submissions list --user bob --status pending
    submissions
      .command('list')
      .description('List submissions with their status')
      .alias('ls')
      .option('-u, --user <user>', 'Only submissions of this user')
      .option('-s, --status <status>', `Only submissions in this status (${STATUS_FILTERS})`)
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: SubmissionsListOptions) => {
        await this.executeList(options);
      });
  }

  /**
   * catalog-submissions submissions list
   */
  async executeList(options: SubmissionsListOptions): Promise<void> {
    try {
      const status = options.status === undefined ? undefined : parseStatusFilter(options.status);
      if (options.status !== undefined && status === undefined) {
        this.handleError(
          `Invalid status: ${options.status}. Valid values: ${STATUS_FILTERS}`,
          options,
        );
        return;
      }

      this.dependencyService.setLogLevel(this.logLevelFor(options));
      const service = await this.dependencyService.getItemSubmissionService();

      const found: ChangeDescriptor.ChangeDescriptor[] = [];
      for await (const descriptor of service.listSubmissions(options.user)) {
        if (status === undefined || descriptor.status === status) {
          found.push(descriptor);
        }
      }

      this.handleSuccess(
        found.map(descriptor => ({
          filename: descriptor.filename,
          itemType: descriptor.itemType,
          changeKind: descriptor.changeKind,
          status: descriptor.status,
          url: descriptor.url,
          createdAt: descriptor.createdAt?.toISOString(),
          user: descriptor.user,
          isDataOwner: descriptor.isDataOwner,
        })),
        options,
        `${found.length} submission(s)`,
        found.map(descriptor =>
          `   [${descriptor.status ?? 'Unknown'}] ${descriptor.changeKind} ${descriptor.filename} (${descriptor.user}) ${descriptor.url ?? ''}`.trimEnd(),
        ),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.handleError(
        `Listing submissions failed: ${message}`,
        options,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
