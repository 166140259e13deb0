import { Command } from 'commander';
import { CliContext } from '../context';

export function registerCopyCommand(program: Command, ctx: CliContext) {
  program
    .command('copy')
    .description('Copy generated test files into the target tree and update the manifest')
    .argument('<model>', 'model name')
    .allowExcessArguments(false)
    .action(async (model: string) => {
      const report = await ctx.builder().copy(model);
      ctx.renderer().render({
        status: 'SUCCESS',
        command: 'copy',
        model: report.model,
        summary: `Copied ${report.copied.length} file(s) for ${report.model}`,
        files: { Removed: report.removed, Copied: report.copied },
        manifestSources: report.manifestSources,
      });
    });
}
