import { Command } from 'commander';
import { ConsoleLogger, Logger, resolve } from '@testbuilder/shared';
import { ProcessRunner, SpawnProcessRunner } from '@testbuilder/exec';
import { ConfigLoader, ConfigOptions, LoadedConfig, Testbuilder } from '@testbuilder/core';
import { OutputRenderer } from './output/renderer';

export interface GlobalOptions {
  config?: string;
  cwd?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Everything the commands reach outside the process through. Tests replace
 * these with fakes.
 */
export interface CliDependencies {
  runner: ProcessRunner;
  loadConfig: (options: ConfigOptions) => LoadedConfig;
  createLogger: (verbose: boolean) => Logger;
}

export const defaultDependencies: CliDependencies = {
  runner: new SpawnProcessRunner(),
  loadConfig: (options) => ConfigLoader.load(options),
  createLogger: (verbose) => new ConsoleLogger({ verbose }),
};

export class CliContext {
  constructor(
    private readonly program: Command,
    readonly deps: CliDependencies,
  ) {}

  get options(): GlobalOptions {
    return this.program.opts<GlobalOptions>();
  }

  /** Directory holding the models; defaults to where the command was started */
  get workDir(): string {
    return resolve(this.options.cwd ?? process.cwd());
  }

  logger(): Logger {
    return this.deps.createLogger(this.options.verbose ?? false);
  }

  loadConfig(): LoadedConfig {
    return this.deps.loadConfig({ configPath: this.options.config, cwd: this.workDir });
  }

  builder(): Testbuilder {
    return new Testbuilder({
      config: this.loadConfig(),
      runner: this.deps.runner,
      workDir: this.workDir,
      logger: this.logger(),
    });
  }

  renderer(): OutputRenderer {
    return new OutputRenderer(this.options.json ?? false);
  }
}
