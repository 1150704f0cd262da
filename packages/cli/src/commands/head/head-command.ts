import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface HeadCommandOptions extends BaseCommandOptions {
  /** Repository as owner/name */
  slug: string;
  /** Branch to read (default: 'master') */
  branch?: string;
}

/**
 * Head Command - prints the SHA at the tip of a branch
 */
export class HeadCommand extends BaseCommand<HeadCommandOptions> {
  protected description = 'Print the commit at the tip of a branch';

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('head <slug>')
        .description(this.description)
        .option('-b, --branch <branch>', 'Branch to read', 'master')
    ).action(async (slug: string, options: BaseCommandOptions & { branch?: string }) => {
      await this.execute({ ...options, slug });
    });
  }

  async execute(options: HeadCommandOptions): Promise<void> {
    const branch = options.branch || 'master';
    try {
      const { owner, name } = this.parseSlug(options.slug);
      const github = await this.endpoints.getGitHubEndpoint();
      const sha = await github.getHead(owner, name, branch);

      if (sha === null) {
        this.handleError(`Branch ${branch} not found in ${options.slug}`, options);
        return;
      }
      this.handleSuccess({ repository: options.slug, branch, sha }, options, undefined, sha);
    } catch (error) {
      this.handleFailure(error, options);
    }
  }
}
