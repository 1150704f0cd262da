import { Command } from 'commander';
import { EncryptCommand } from './encrypt-command';

/**
 * Register the encrypt command
 */
export function registerEncryptCommand(program: Command): void {
  const encryptCommand = new EncryptCommand();
  encryptCommand.register(program);
}
