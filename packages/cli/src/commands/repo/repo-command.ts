import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface RepoCommandOptions extends BaseCommandOptions {
  /** Repository as owner/name */
  slug: string;
}

/**
 * Repo Command - prints a GitHub repository
 */
export class RepoCommand extends BaseCommand<RepoCommandOptions> {
  protected description = 'Show a GitHub repository';

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('repo <slug>')
        .description(this.description)
    ).action(async (slug: string, options: BaseCommandOptions) => {
      await this.execute({ ...options, slug });
    });
  }

  async execute(options: RepoCommandOptions): Promise<void> {
    try {
      const { owner, name } = this.parseSlug(options.slug);
      const github = await this.endpoints.getGitHubEndpoint();
      const repo = await github.getRepository(owner, name);

      const text = [
        `  Default branch: ${repo.default_branch}`,
        `  Visibility:     ${repo.private ? 'private' : 'public'}`,
        `  URL:            ${repo.html_url}`,
      ].join('\n');
      this.handleSuccess(repo, options, repo.full_name, text);
    } catch (error) {
      this.handleFailure(error, options);
    }
  }
}
