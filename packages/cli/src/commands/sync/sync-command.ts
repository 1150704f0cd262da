import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface SyncCommandOptions extends BaseCommandOptions {
  /** Wait until Travis finishes syncing (default: true) */
  block?: boolean;
}

/**
 * Sync Command - asks Travis CI to resync repositories from GitHub
 */
export class SyncCommand extends BaseCommand<SyncCommandOptions> {
  protected description = 'Resync Travis CI with GitHub';

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('sync')
        .description(this.description)
        .option('--no-block', 'Return once the sync is requested')
    ).action(async (options: SyncCommandOptions) => {
      await this.execute(options);
    });
  }

  async execute(options: SyncCommandOptions): Promise<void> {
    const block = options.block ?? true;
    try {
      const travis = await this.endpoints.getTravisEndpoint();
      const status = await travis.sync({ block });

      if (status === null) {
        this.handleSuccess({ blocked: false }, options, 'Sync requested', '');
        return;
      }
      this.handleSuccess(
        { blocked: true, syncedAt: status.syncedAt, polls: status.polls },
        options,
        `Synchronised at ${status.syncedAt} after ${status.polls} polls`,
        ''
      );
    } catch (error) {
      this.handleFailure(error, options);
    }
  }
}
