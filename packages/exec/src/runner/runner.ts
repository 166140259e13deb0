import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { FilesystemError, ToolError } from '@testbuilder/shared';
import type { ProcessRequest, ProcessResult, ProcessRunner } from './types';

/**
 * Formats a request the way a user would type it, for log lines.
 */
export function describeCommand(req: Pick<ProcessRequest, 'command' | 'args' | 'stdoutFile'>): string {
  const line = [req.command, ...req.args].join(' ');
  return req.stdoutFile ? `${line} > ${req.stdoutFile}` : line;
}

/**
 * Runs external tools with `child_process.spawn`, one at a time. There is no
 * timeout: a tool that never exits blocks the caller.
 */
export class SpawnProcessRunner implements ProcessRunner {
  async run(req: ProcessRequest): Promise<ProcessResult> {
    const inherit = req.stdio === 'inherit';
    const target = req.stdoutFile ? path.resolve(req.cwd, req.stdoutFile) : undefined;

    let stdout = '';
    let stderr = '';
    const start = Date.now();

    const exitCode = await new Promise<number>((resolve, reject) => {
      let failed = false;
      const fail = (err: Error) => {
        failed = true;
        reject(err);
      };

      const child = spawn(req.command, req.args, {
        cwd: req.cwd,
        env: { ...process.env, ...req.env },
        stdio: inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      const stdoutStream = target ? fs.createWriteStream(target) : undefined;
      if (stdoutStream && target) {
        stdoutStream.on('error', (err) => {
          if (failed) return;
          child.kill();
          fail(
            new FilesystemError(target, `Cannot write ${target}: ${err.message}`, {
              cause: err,
              details: { path: target, command: describeCommand(req) },
            }),
          );
        });
        stdoutStream.on('drain', () => child.stdout?.resume());
      }

      child.stdout?.on('data', (chunk: Buffer) => {
        if (stdoutStream) {
          if (!failed && !stdoutStream.write(chunk)) {
            child.stdout?.pause();
          }
        } else {
          stdout += chunk.toString('utf8');
        }
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8');
      });

      child.on('error', (err) => {
        stdoutStream?.destroy();
        fail(
          new ToolError(`Failed to start process: ${err.message}`, {
            cause: err,
            details: { command: describeCommand(req), cwd: req.cwd },
          }),
        );
      });

      child.on('close', (code) => {
        if (failed) return;
        if (!stdoutStream) {
          resolve(code ?? -1);
          return;
        }
        // Resolve once the redirect file is flushed; a late write error rejects instead.
        stdoutStream.end(() => {
          if (!failed) resolve(code ?? -1);
        });
      });
    });

    return {
      exitCode,
      stdout,
      stderr,
      durationMs: Date.now() - start,
    };
  }
}
