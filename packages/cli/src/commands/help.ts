import { Command } from 'commander';
import fs from 'fs';
import { fileURLToPath } from 'url';

const HELP_FILE = new URL('../../testbuilder.help', import.meta.url);

export function readHelpText(): string {
  return fs.readFileSync(fileURLToPath(HELP_FILE), 'utf8');
}

export function registerHelpCommand(program: Command) {
  program
    .command('help')
    .description('Show how models, generated tests and the target tree fit together')
    .allowExcessArguments(false)
    .action(() => {
      program.outputHelp();
      console.log('');
      console.log(readHelpText());
    });
}
