export interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Redirect stdout into this file instead of capturing it */
  stdoutFile?: string;
  /** `inherit` streams output straight to the console; nothing is captured */
  stdio?: 'capture' | 'inherit';
  env?: Record<string, string>;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * The one capability the pipeline needs from the host: start a program and
 * wait for it to exit. Tests substitute a fake.
 */
export interface ProcessRunner {
  run(req: ProcessRequest): Promise<ProcessResult>;
}
