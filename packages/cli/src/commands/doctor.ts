import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import which from 'which';
import chalk from 'chalk';
import { AppError } from '@testbuilder/shared';
import { LoadedConfig, loadManifest } from '@testbuilder/core';
import { CliContext } from '../context';

const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

type CheckResult = [string, string];

async function checkExecutable(label: string, name: string): Promise<CheckResult> {
  try {
    const found = await which(name);
    return [CHECKS.OK, `${label} (${name}) found at: ${found}`];
  } catch {
    return [CHECKS.FAIL, `${label} (${name}) not found.`];
  }
}

async function checkDirectory(label: string, dir: string): Promise<CheckResult> {
  try {
    const stats = await fs.stat(dir);
    if (stats.isDirectory()) {
      return [CHECKS.OK, `${label}: ${dir}`];
    }
    return [CHECKS.FAIL, `${label} is not a directory: ${dir}`];
  } catch {
    return [CHECKS.FAIL, `${label} does not exist: ${dir}`];
  }
}

async function checkBuildTool(config: LoadedConfig): Promise<CheckResult> {
  if (!/[\\/]/.test(config.buildTool)) {
    return checkExecutable('Build tool', config.buildTool);
  }
  const tool = path.resolve(config.targetRoot, config.buildTool);
  try {
    await fs.access(tool);
    return [CHECKS.OK, `Build tool found at: ${tool}`];
  } catch {
    return [CHECKS.WARN, `Build tool not found at: ${tool}. 'compile' will fail.`];
  }
}

async function checkManifest(config: LoadedConfig): Promise<CheckResult> {
  try {
    const manifest = await loadManifest(config.manifest);
    return [CHECKS.OK, `Manifest lists ${manifest.sources.size} source(s): ${config.manifest}`];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [CHECKS.FAIL, message];
  }
}

export async function runDoctorChecks(config: LoadedConfig): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  results.push([
    CHECKS.OK,
    `Configuration loaded from: ${config.sources.join(', ') || '(defaults only)'}`,
  ]);
  results.push(await checkExecutable('Model checker', config.checker));
  results.push(await checkExecutable('Test generator', config.generator));
  results.push(await checkExecutable('Simulator', config.simulator));
  results.push(await checkDirectory('Target root', config.targetRoot));
  results.push(await checkDirectory('Test source directory', config.testSourceDir));
  results.push(await checkBuildTool(config));
  results.push(await checkManifest(config));
  return results;
}

export const registerDoctorCommand = (program: Command, ctx: CliContext) => {
  const command = new Command('doctor');

  command
    .description('Check the configuration and the external tools it names')
    .allowExcessArguments(false)
    .action(async () => {
      console.log(chalk.bold('Testbuilder Environment Checkup'));
      console.log('-------------------------------');

      let results: CheckResult[];
      try {
        results = await runDoctorChecks(ctx.loadConfig());
      } catch (error: unknown) {
        if (!(error instanceof AppError)) throw error;
        results = [[CHECKS.FAIL, error.message]];
      }

      for (const [status, message] of results) {
        console.log(`${status} ${message}`);
      }

      if (results.some(([status]) => status === CHECKS.FAIL)) {
        process.exitCode = 1;
      }
    });

  program.addCommand(command);
};
