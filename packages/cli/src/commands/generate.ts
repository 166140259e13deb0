import { Command } from 'commander';
import { CliContext } from '../context';

export function registerGenerateCommand(program: Command, ctx: CliContext) {
  program
    .command('generate')
    .description('Run the model checker and generate test sources for a model')
    .argument('<model>', 'model name (stem of <model>.pml)')
    .allowExcessArguments(false)
    .action(async (model: string) => {
      const report = await ctx.builder().generate(model);
      const summary =
        report.trailCount === 0
          ? `No counterexamples found for ${report.model}`
          : `Generated tests for ${report.trailCount} trail(s) of ${report.model}`;
      ctx.renderer().render({
        status: 'SUCCESS',
        command: 'generate',
        model: report.model,
        summary,
        files: { 'Spin summaries': report.summaries },
        trailCount: report.trailCount,
        generatorRuns: report.generatorRuns,
      });
    });
}
