import * as fs from 'fs';
import type { Command } from 'commander';
import type { ItemSubmission } from '@catalog-submissions/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { ItemDeleteOptions, ItemWriteOptions } from './item_command.types';

/**
 * ItemCommand - submit catalog item changes as pull requests.
 */
export class ItemCommand extends BaseCommand<BaseCommandOptions> {

  register(program: Command): void {
    const item = program
      .command('item')
      .description('Submit catalog item changes as pull requests')
      .alias('i');

    // catalog-submissions item add x.json --user bob --type product --file ./x.json
    item
      .command('add <filename>')
      .description('Propose a new item at <user>/<filename>')
      .requiredOption('-u, --user <user>', 'Owner of the item')
      .requiredOption('-t, --type <type>', 'Item type (also the pull request label)')
      .requiredOption('-f, --file <path>', 'Local file with the item content')
      .option('--data-owner', 'Requester owns the data behind the item')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (filename: string, options: ItemWriteOptions) => {
        await this.executeAdd(filename, options);
      });

    item
      .command('update <filename>')
      .description('Propose new content for the item at <user>/<filename>')
      .requiredOption('-u, --user <user>', 'Owner of the item')
      .requiredOption('-t, --type <type>', 'Item type (also the pull request label)')
      .requiredOption('-f, --file <path>', 'Local file with the item content')
      .option('--data-owner', 'Requester owns the data behind the item')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (filename: string, options: ItemWriteOptions) => {
        await this.executeUpdate(filename, options);
      });

    item
      .command('delete <filename>')
      .description('Propose removing the item at <user>/<filename>')
      .alias('rm')
      .requiredOption('-u, --user <user>', 'Owner of the item')
      .requiredOption('-t, --type <type>', 'Item type (also the pull request label)')
      .option('--data-owner', 'Requester owns the data behind the item')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (filename: string, options: ItemDeleteOptions) => {
        await this.executeDelete(filename, options);
      });
  }

  /**
   * catalog-submissions item add <filename>
   */
  async executeAdd(filename: string, options: ItemWriteOptions): Promise<void> {
    await this.executeWrite('add', filename, options);
  }

  /**
   * catalog-submissions item update <filename>
   */
  async executeUpdate(filename: string, options: ItemWriteOptions): Promise<void> {
    await this.executeWrite('update', filename, options);
  }

  /**
   * catalog-submissions item delete <filename>
   */
  async executeDelete(filename: string, options: ItemDeleteOptions): Promise<void> {
    try {
      const service = await this.getService(options);
      const result = await service.deleteItem({
        user: options.user,
        itemType: options.type,
        filename,
        isDataOwner: options.dataOwner ?? false,
      });
      this.report(result, options);
    } catch (error) {
      this.fail('delete', error, options);
    }
  }

  private async executeWrite(action: 'add' | 'update', filename: string, options: ItemWriteOptions): Promise<void> {
    try {
      const content = await fs.promises.readFile(options.file);
      const service = await this.getService(options);
      const request = {
        user: options.user,
        itemType: options.type,
        filename,
        content,
        isDataOwner: options.dataOwner ?? false,
      };
      const result = action === 'add'
        ? await service.addItem(request)
        : await service.updateItem(request);
      this.report(result, options);
    } catch (error) {
      this.fail(action, error, options);
    }
  }

  private async getService(options: BaseCommandOptions): Promise<ItemSubmission.IItemSubmissionService> {
    this.dependencyService.setLogLevel(this.logLevelFor(options));
    return this.dependencyService.getItemSubmissionService();
  }

  private report(result: ItemSubmission.ItemSubmissionResult, options: BaseCommandOptions): void {
    const { descriptor, receipt } = result;
    this.handleSuccess(
      {
        filename: descriptor.filename,
        itemType: descriptor.itemType,
        changeKind: descriptor.changeKind,
        user: descriptor.user,
        isDataOwner: descriptor.isDataOwner,
        branch: receipt.branch,
        pullRequest: receipt.pullRequest,
      },
      options,
      `Submitted: ${descriptor.changeKind} ${descriptor.filename}`,
      [
        `   Branch:       ${receipt.branch}`,
        `   Pull request: #${receipt.pullRequest.number} ${receipt.pullRequest.url}`,
      ],
    );
  }

  private fail(action: string, error: unknown, options: BaseCommandOptions): void {
    const message = error instanceof Error ? error.message : String(error);
    this.handleError(
      `Item ${action} failed: ${message}`,
      options,
      error instanceof Error ? error : undefined,
    );
  }
}
