import { MissingInputError, isFile, join } from '@testbuilder/shared';
import { ReadinessFile, parseModelId, readinessFiles } from '../naming/scheme';

export interface ReadinessReport {
  model: string;
  ready: boolean;
  missing: ReadinessFile[];
}

/**
 * Checks every readiness file of `model` in `workDir`. All five are checked
 * on each call so that the caller can report every problem at once.
 */
export async function checkReadiness(workDir: string, model: string): Promise<ReadinessReport> {
  const id = parseModelId(model);
  const files = readinessFiles(id);
  const present = await Promise.all(files.map((f) => isFile(join(workDir, f.file))));
  const missing = files.filter((_, i) => !present[i]);
  return { model: id, ready: missing.length === 0, missing };
}

export async function assertReady(workDir: string, model: string): Promise<ReadinessReport> {
  const report = await checkReadiness(workDir, model);
  if (!report.ready) {
    throw new MissingInputError(
      report.model,
      report.missing.map((f) => f.file),
      { details: { missing: report.missing.map((f) => `${f.file}: ${f.cause}`) } },
    );
  }
  return report;
}
