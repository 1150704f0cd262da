import { Command } from 'commander';
import { RepoCommand } from './repo-command';

/**
 * Register the repo command
 */
export function registerRepoCommand(program: Command): void {
  const repoCommand = new RepoCommand();
  repoCommand.register(program);
}
