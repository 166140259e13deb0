import { ProcessError, Logger } from '@testbuilder/shared';
import { ProcessRequest, ProcessResult, ProcessRunner, describeCommand } from '@testbuilder/exec';

export interface ToolPolicy {
  /** Raise on a non-zero exit instead of warning and carrying on */
  strictExitCodes: boolean;
}

/**
 * Runs an external tool and surfaces its exit status according to `policy`.
 */
export async function runTool(
  runner: ProcessRunner,
  req: ProcessRequest,
  policy: ToolPolicy,
  logger: Logger,
): Promise<ProcessResult> {
  const command = describeCommand(req);
  logger.debug(`Running: ${command}`);
  const result = await runner.run(req);
  if (result.exitCode !== 0) {
    if (policy.strictExitCodes) {
      throw new ProcessError(`${command} exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        details: result.stderr ? { stderr: result.stderr.slice(0, 2000) } : undefined,
      });
    }
    logger.warn(`${command} exited with status ${result.exitCode}; continuing`);
  }
  return result;
}
