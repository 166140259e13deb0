import { Command } from 'commander';
import { CliContext } from '../context';

export function registerZeroCommand(program: Command, ctx: CliContext) {
  program
    .command('zero')
    .description('Reset the manifest to the baseline test source only')
    .allowExcessArguments(false)
    .action(async () => {
      const manifest = await ctx.builder().zero();
      ctx.renderer().render({
        status: 'SUCCESS',
        command: 'zero',
        summary: 'Manifest reset to baseline',
        files: { Sources: manifest.sources.toArray() },
      });
    });
}
