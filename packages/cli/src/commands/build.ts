import { Command } from 'commander';
import { CliContext } from '../context';

export function registerCompileCommand(program: Command, ctx: CliContext) {
  program
    .command('compile')
    .description('Configure and build the target tree')
    .allowExcessArguments(false)
    .action(async () => {
      await ctx.builder().compile();
    });
}

export function registerRunCommand(program: Command, ctx: CliContext) {
  program
    .command('run')
    .description('Run the test executable on the simulator')
    .allowExcessArguments(false)
    .action(async () => {
      const exitCode = await ctx.builder().run();
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}
