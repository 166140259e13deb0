import { Command } from 'commander';
import { CliContext } from '../context';

export function registerCleanCommand(program: Command, ctx: CliContext) {
  program
    .command('clean')
    .description('Remove spin and generated test files for a model')
    .argument('<model>', 'model name')
    .allowExcessArguments(false)
    .action(async (model: string) => {
      const report = await ctx.builder().clean(model);
      ctx.renderer().render({
        status: 'SUCCESS',
        command: 'clean',
        model: report.model,
        summary: `Removed ${report.removed.length} file(s) for ${report.model}`,
        files: { Removed: report.removed },
      });
    });
}
