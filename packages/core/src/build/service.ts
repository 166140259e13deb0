import { Logger, SilentLogger, TestbuilderConfig } from '@testbuilder/shared';
import { ProcessRunner, describeCommand } from '@testbuilder/exec';
import { runTool } from '../tools/run-tool';

export type BuildConfig = Pick<
  TestbuilderConfig,
  | 'targetRoot'
  | 'buildTool'
  | 'simulatorRoot'
  | 'simulator'
  | 'simulatorArgs'
  | 'testExecutable'
  | 'strictExitCodes'
>;

/**
 * The `compile` and `run` verbs: hand the target tree to its build tool and
 * the resulting executable to the simulator. Output goes straight to the
 * console.
 */
export class BuildService {
  private readonly logger: Logger;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly config: BuildConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? new SilentLogger();
  }

  async compile(): Promise<void> {
    const { targetRoot, buildTool } = this.config;
    this.logger.info(`Compiling tests in ${targetRoot}`);
    await this.tool(targetRoot, buildTool, ['configure']);
    await this.tool(targetRoot, buildTool, []);
  }

  async runTests(): Promise<number> {
    const { simulatorRoot, simulator, simulatorArgs, testExecutable } = this.config;
    const args = [...simulatorArgs, testExecutable];
    this.logger.info(`Doing ${describeCommand({ command: simulator, args })}`);
    const result = await this.tool(simulatorRoot, simulator, args);
    return result.exitCode;
  }

  private tool(cwd: string, command: string, args: string[]) {
    return runTool(
      this.runner,
      { command, args, cwd, stdio: 'inherit' },
      { strictExitCodes: this.config.strictExitCodes },
      this.logger,
    );
  }
}
