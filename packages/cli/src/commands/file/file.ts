import { Command } from 'commander';
import { FileCommand } from './file-command';

/**
 * Register the file command
 */
export function registerFileCommand(program: Command): void {
  const fileCommand = new FileCommand();
  fileCommand.register(program);
}
