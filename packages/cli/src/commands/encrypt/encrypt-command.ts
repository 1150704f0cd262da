import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface EncryptCommandOptions extends BaseCommandOptions {
  /** Repository as owner/name */
  slug: string;
  /** Value to encrypt, typically NAME=value */
  value: string;
}

/**
 * Encrypt Command - encrypts a value with a repository's Travis key
 */
export class EncryptCommand extends BaseCommand<EncryptCommandOptions> {
  protected description = 'Encrypt a value for .travis.yml with the repository key';

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('encrypt <slug> <value>')
        .description(this.description)
    ).action(async (slug: string, value: string, options: BaseCommandOptions) => {
      await this.execute({ ...options, slug, value });
    });
  }

  async execute(options: EncryptCommandOptions): Promise<void> {
    try {
      const { owner, name } = this.parseSlug(options.slug);
      const travis = await this.endpoints.getTravisEndpoint();
      const secure = await travis.encrypt(owner, name, options.value);

      this.handleSuccess({ repository: options.slug, secure }, options, undefined, `secure: "${secure}"`);
    } catch (error) {
      this.handleFailure(error, options);
    }
  }
}
