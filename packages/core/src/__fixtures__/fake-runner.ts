import { writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import type { ProcessRequest, ProcessResult, ProcessRunner } from '@testbuilder/exec';

export interface FakeToolchainOptions {
  checker?: string;
  generator?: string;
  /** Number of trail files the enumeration run leaves behind */
  trails: number;
  /** Files the generator writes for `<model> [offset]` */
  generatorFiles?: (model: string, offset?: string) => string[];
  /** Exit code per command name; defaults to 0 */
  exitCodes?: Record<string, number>;
}

const defaultGeneratorFiles = (model: string, offset?: string) =>
  offset === undefined ? [`tr-${model}.c`, `tr-${model}.h`] : [`tr-${model}-${offset}.c`];

/**
 * Stands in for the model checker and the test-source generator: writes the
 * files the real tools would and records every invocation.
 */
export class FakeToolchain implements ProcessRunner {
  readonly calls: ProcessRequest[] = [];
  private readonly checker: string;
  private readonly generator: string;

  constructor(private readonly options: FakeToolchainOptions) {
    this.checker = options.checker ?? 'spin';
    this.generator = options.generator ?? 'spin2test';
  }

  async run(req: ProcessRequest): Promise<ProcessResult> {
    this.calls.push(req);

    if (req.command === this.checker && req.args.includes('-e')) {
      const model = this.modelOf(req.args);
      const { trails } = this.options;
      for (let i = 1; i <= trails; i++) {
        const name = trails === 1 ? `${model}.pml.trail` : `${model}.pml${i}.trail`;
        await writeFile(join(req.cwd, name), `trail ${i}\n`);
      }
    } else if (req.command === this.checker && req.stdoutFile) {
      await writeFile(resolve(req.cwd, req.stdoutFile), `replay ${req.args[1]}\n`);
    } else if (req.command === this.generator) {
      const [model, offset] = this.generatorTarget(req.args);
      const files = (this.options.generatorFiles ?? defaultGeneratorFiles)(model, offset);
      for (const file of files) {
        await writeFile(join(req.cwd, file), `/* ${file} */\n`);
      }
    }

    return {
      exitCode: this.options.exitCodes?.[req.command] ?? 0,
      stdout: '',
      stderr: '',
      durationMs: 0,
    };
  }

  callsTo(command: string): ProcessRequest[] {
    return this.calls.filter((call) => call.command === command);
  }

  /** `<model> [offset]` from the end of the generator's arguments */
  private generatorTarget(args: string[]): [string, string | undefined] {
    const last = args[args.length - 1];
    return /^\d+$/.test(last) ? [args[args.length - 2], last] : [last, undefined];
  }

  private modelOf(args: string[]): string {
    const pml = args[args.length - 1];
    return pml.replace(/\.pml$/, '');
  }
}
