import { Command } from 'commander';
import { CliContext, CliDependencies, defaultDependencies } from './context';
import {
  registerHelpCommand,
  registerCleanCommand,
  registerZeroCommand,
  registerGenerateCommand,
  registerCopyCommand,
  registerCompileCommand,
  registerRunCommand,
  registerDoctorCommand,
} from './commands';

export const name = '@testbuilder/cli';
export const version = '0.1.0';

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('testbuilder')
    .description('Generate regression tests from model-checker counterexamples')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--cwd <dir>', 'Directory holding the models (default: current directory)')
    .option('--verbose', 'Enable verbose logging')
    .helpCommand(false)
    .showHelpAfterError();

  const ctx = new CliContext(program, deps);

  registerHelpCommand(program);
  registerCleanCommand(program, ctx);
  registerZeroCommand(program, ctx);
  registerGenerateCommand(program, ctx);
  registerCopyCommand(program, ctx);
  registerCompileCommand(program, ctx);
  registerRunCommand(program, ctx);
  registerDoctorCommand(program, ctx);

  return program;
}
