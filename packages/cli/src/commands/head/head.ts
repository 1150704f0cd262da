import { Command } from 'commander';
import { HeadCommand } from './head-command';

/**
 * Register the head command
 */
export function registerHeadCommand(program: Command): void {
  const headCommand = new HeadCommand();
  headCommand.register(program);
}
