import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command, CommanderError } from 'commander';
import { mkdir, mkdtemp, readFile, writeFile } from 'fs/promises';
import { remove } from 'fs-extra';
import { tmpdir } from 'os';
import { join } from 'path';
import yaml from 'js-yaml';
import type { ProcessRequest, ProcessRunner } from '@testbuilder/exec';
import type { LoadedConfig } from '@testbuilder/core';
import { ConfigError, SilentLogger, TestbuilderConfigSchema } from '@testbuilder/shared';
import { createProgram, name } from './program';
import { CliDependencies } from './context';

const stripAnsi = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '');

function quiet(program: Command, errors: string[]): Command {
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({
      writeOut: () => {},
      writeErr: (text) => errors.push(text),
    });
  }
  return program;
}

async function parseError(program: Command, args: string[]): Promise<unknown> {
  try {
    await program.parseAsync(['node', 'testbuilder', ...args]);
  } catch (e: unknown) {
    return e;
  }
  return undefined;
}

describe('testbuilder CLI', () => {
  let root: string;
  let workDir: string;
  let config: LoadedConfig;
  let calls: ProcessRequest[];
  let deps: CliDependencies;
  let output: string[];
  let errors: string[];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'testbuilder-cli-'));
    workDir = join(root, 'models');
    const targetRoot = join(root, 'target');
    await mkdir(workDir, { recursive: true });
    config = {
      ...TestbuilderConfigSchema.parse({
        generator: 'spin2test',
        targetRoot,
        simulatorRoot: root,
        simulator: 'sis',
        manifest: join(targetRoot, 'model-0.yml'),
        testSourceDir: join(targetRoot, 'testsuites', 'validation'),
        testExecutable: 'ts-model-0.exe',
      }),
      sources: [],
    };
    await mkdir(config.testSourceDir, { recursive: true });
    await writeFile(config.manifest, yaml.dump({ source: ['testsuites/validation/old.c'] }));

    calls = [];
    const runner: ProcessRunner = {
      run: async (req) => {
        calls.push(req);
        return { exitCode: 0, stdout: '', stderr: '', durationMs: 0 };
      },
    };
    deps = {
      runner,
      loadConfig: vi.fn(() => config),
      createLogger: () => new SilentLogger(),
    };

    output = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(stripAnsi(args.map(String).join(' ')));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await remove(root);
  });

  const run = (...args: string[]) =>
    quiet(createProgram(deps), errors).parseAsync([
      'node',
      'testbuilder',
      '--cwd',
      workDir,
      ...args,
    ]);

  it('exports its package name', () => {
    expect(name).toBe('@testbuilder/cli');
  });

  it('registers one command per verb', () => {
    const names = createProgram(deps).commands.map((c) => c.name());
    expect(names).toEqual([
      'help',
      'clean',
      'zero',
      'generate',
      'copy',
      'compile',
      'run',
      'doctor',
    ]);
  });

  it('rejects a missing model argument', async () => {
    const error = await parseError(quiet(createProgram(deps), errors), ['generate']);
    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.missingArgument', exitCode: 1 });
  });

  it('rejects extra arguments', async () => {
    const error = await parseError(quiet(createProgram(deps), errors), ['zero', 'extra']);
    expect(error).toMatchObject({ code: 'commander.excessArguments' });
  });

  it('rejects unknown verbs', async () => {
    const error = await parseError(quiet(createProgram(deps), errors), ['deploy']);
    expect(error).toMatchObject({ code: 'commander.unknownCommand' });
  });

  it('prints the bundled help text without loading configuration', async () => {
    await run('help');
    expect(output.join('\n')).toContain('generate <model>     generate spin summaries');
    expect(deps.loadConfig).not.toHaveBeenCalled();
  });

  it('fails generate with missing inputs before running any tool', async () => {
    await expect(run('generate', 'mutex')).rejects.toMatchObject({ code: 'MissingInput' });
    expect(calls).toEqual([]);
  });

  it('reports a model without counterexamples as JSON', async () => {
    for (const suffix of ['.pml', '-pre.h', '-post.h', '-run.h', '-rfn.yml']) {
      await writeFile(join(workDir, `mutex${suffix}`), '');
    }

    await run('--json', 'generate', 'mutex');

    expect(calls.map((c) => c.command)).toEqual(['spin']);
    expect(JSON.parse(output[0])).toMatchObject({
      status: 'SUCCESS',
      command: 'generate',
      model: 'mutex',
      summary: 'No counterexamples found for mutex',
      trailCount: 0,
    });
  });

  it('copies files and updates the manifest', async () => {
    await writeFile(join(workDir, 'tr-mutex-0.c'), '');

    await run('--json', 'copy', 'mutex');

    expect(JSON.parse(output[0])).toMatchObject({
      manifestSources: ['testsuites/validation/tr-mutex-0.c'],
    });
    expect(yaml.load(await readFile(config.manifest, 'utf8'))).toEqual({
      source: ['testsuites/validation/old.c', 'testsuites/validation/tr-mutex-0.c'],
    });
  });

  it('zeroes the manifest', async () => {
    await run('zero');
    expect(yaml.load(await readFile(config.manifest, 'utf8'))).toEqual({
      source: ['testsuites/validation/ts-model-0.c'],
    });
  });

  it('runs the build tool and the simulator', async () => {
    await run('compile');
    await run('run');

    expect(calls.map((c) => [c.command, ...c.args].join(' '))).toEqual([
      './waf configure',
      './waf',
      'sis -leon3 -r s -m 2 ts-model-0.exe',
    ]);
  });

  it('passes the config path and working directory to the loader', async () => {
    await run('--config', 'custom.yml', 'zero');
    expect(deps.loadConfig).toHaveBeenCalledWith({ configPath: 'custom.yml', cwd: workDir });
  });

  it('doctor flags a configuration error', async () => {
    deps.loadConfig = () => {
      throw new ConfigError('Please configure testbuilder.yml');
    };

    await run('doctor');

    expect(output).toContain('Testbuilder Environment Checkup');
    expect(output.some((line) => line.endsWith('Please configure testbuilder.yml'))).toBe(true);
    expect(process.exitCode).toBe(1);
  });
});
