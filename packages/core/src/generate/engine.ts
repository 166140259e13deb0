import { Logger, SilentLogger, eventBase, join } from '@testbuilder/shared';
import { ProcessRunner } from '@testbuilder/exec';
import { countMatching } from '../artifacts/files';
import {
  descriptionFile,
  parseModelId,
  summaryFile,
  trailPattern,
  trailSelector,
} from '../naming/scheme';
import { runTool, ToolPolicy } from '../tools/run-tool';

export interface TrailEngineOptions {
  runner: ProcessRunner;
  /** Model checker executable */
  checker: string;
  /** Test-source generator executable */
  generator: string;
  /** Leading generator arguments, e.g. the script for an interpreter */
  generatorArgs?: string[];
  policy: ToolPolicy;
  logger?: Logger;
}

export interface GenerationReport {
  model: string;
  trailCount: number;
  /** Spin summary files written, in trail order */
  summaries: string[];
  /** Arguments of each generator invocation, in order */
  generatorRuns: string[][];
}

/**
 * Drives the model checker and the test-source generator for one model.
 * Every external process is awaited before the next one starts.
 */
export class TrailGenerationEngine {
  private readonly logger: Logger;

  constructor(private readonly options: TrailEngineOptions) {
    this.logger = options.logger ?? new SilentLogger();
  }

  async generate(workDir: string, model: string): Promise<GenerationReport> {
    const id = parseModelId(model);
    const logger = this.logger.child({ model: id });
    const pml = descriptionFile(id);

    logger.trace(
      {
        ...eventBase(id),
        type: 'GenerationStarted',
        payload: { workDir, generator: this.options.generator },
      },
      `Generating spin and test files for ${id}`,
    );

    await this.tool(workDir, this.options.checker, ['-DTEST_GEN', '-run', '-E', '-c0', '-e', pml]);

    const trailCount = await countMatching(workDir, trailPattern(id));
    logger.log({ ...eventBase(id), type: 'TrailsCounted', payload: { count: trailCount } });

    const report: GenerationReport = { model: id, trailCount, summaries: [], generatorRuns: [] };

    if (trailCount === 0) {
      logger.info('Checker produced no trails; nothing to generate');
      return report;
    }

    if (trailCount === 1) {
      await this.writeSummary(workDir, id, ['-T', '-t', pml], summaryFile(id), report, logger);
      await this.invokeGenerator(workDir, id, undefined, report, logger);
      return report;
    }

    for (let offset = 0; offset < trailCount; offset++) {
      const args = ['-T', trailSelector(offset), pml];
      await this.writeSummary(workDir, id, args, summaryFile(id, offset), report, logger);
      await this.invokeGenerator(workDir, id, offset, report, logger);
    }
    return report;
  }

  private async writeSummary(
    workDir: string,
    model: string,
    args: string[],
    file: string,
    report: GenerationReport,
    logger: Logger,
  ): Promise<void> {
    await this.tool(workDir, this.options.checker, args, join(workDir, file));
    report.summaries.push(file);
    logger.log({
      ...eventBase(model),
      type: 'SummaryWritten',
      payload: { file, selector: args[1] },
    });
  }

  private async invokeGenerator(
    workDir: string,
    model: string,
    offset: number | undefined,
    report: GenerationReport,
    logger: Logger,
  ): Promise<void> {
    const args = [...(this.options.generatorArgs ?? []), model];
    if (offset !== undefined) args.push(String(offset));
    const result = await this.tool(workDir, this.options.generator, args);
    report.generatorRuns.push(args);
    logger.log({
      ...eventBase(model),
      type: 'GeneratorInvoked',
      payload: { args, exitCode: result.exitCode },
    });
  }

  private tool(workDir: string, command: string, args: string[], stdoutFile?: string) {
    return runTool(
      this.options.runner,
      { command, args, cwd: workDir, stdoutFile },
      this.options.policy,
      this.logger,
    );
  }
}
