import { z } from 'zod';

export const DEFAULT_CHECKER = 'spin';
export const DEFAULT_BUILD_TOOL = './waf';
export const DEFAULT_SIMULATOR_ARGS = ['-leon3', '-r', 's', '-m', '2'];
export const DEFAULT_BASELINE_SOURCE = 'testsuites/validation/ts-model-0.c';

const requiredPath = (what: string) =>
  z.string({ required_error: `${what} is required` }).min(1, `${what} must not be empty`);

export const TestbuilderConfigSchema = z.object({
  /** Test-source generator invoked as `<generator> [generatorArgs...] <model> [offset]` */
  generator: requiredPath('generator'),
  /** Root of the target tree; manifest entries are relative to it and `compile` runs here */
  targetRoot: requiredPath('targetRoot'),
  /** Directory the simulator is launched from */
  simulatorRoot: requiredPath('simulatorRoot'),
  /** Simulator command */
  simulator: requiredPath('simulator'),
  /** Build manifest (YAML) holding the `source` list */
  manifest: requiredPath('manifest'),
  /** Directory inside the target tree that receives generated test sources */
  testSourceDir: requiredPath('testSourceDir'),
  /** Test executable handed to the simulator */
  testExecutable: requiredPath('testExecutable'),

  generatorArgs: z.array(z.string()).default([]),
  checker: z.string().min(1).default(DEFAULT_CHECKER),
  buildTool: z.string().min(1).default(DEFAULT_BUILD_TOOL),
  simulatorArgs: z.array(z.string()).default(DEFAULT_SIMULATOR_ARGS),
  baselineSource: z.string().min(1).default(DEFAULT_BASELINE_SOURCE),
  /** Fail the pipeline when an external tool exits non-zero */
  strictExitCodes: z.boolean().default(true),
});

export type TestbuilderConfig = z.infer<typeof TestbuilderConfigSchema>;
export type TestbuilderConfigInput = z.input<typeof TestbuilderConfigSchema>;
