import { Command } from 'commander';
import { SyncCommand } from './sync-command';

/**
 * Register the sync command
 */
export function registerSyncCommand(program: Command): void {
  const syncCommand = new SyncCommand();
  syncCommand.register(program);
}
