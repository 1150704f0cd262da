import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface FileCommandOptions extends BaseCommandOptions {
  /** Repository as owner/name */
  slug: string;
  path: string;
  /** Branch, tag or SHA (default: the repository's default branch) */
  ref?: string;
}

/**
 * File Command - prints a file from a GitHub repository
 */
export class FileCommand extends BaseCommand<FileCommandOptions> {
  protected description = 'Print a file from a GitHub repository';

  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('file <slug> <path>')
        .description(this.description)
        .option('-r, --ref <ref>', 'Branch, tag or commit to read from')
    ).action(async (slug: string, path: string, options: BaseCommandOptions & { ref?: string }) => {
      await this.execute({ ...options, slug, path });
    });
  }

  async execute(options: FileCommandOptions): Promise<void> {
    try {
      const { owner, name } = this.parseSlug(options.slug);
      const github = await this.endpoints.getGitHubEndpoint();
      const content = await github.getFile(owner, name, options.path, options.ref);

      const text = content.toString('utf8');
      this.handleSuccess({
        repository: options.slug,
        path: options.path,
        ref: options.ref ?? null,
        size: content.length,
        content: text,
      }, options, undefined, text);
    } catch (error) {
      this.handleFailure(error, options);
    }
  }
}
