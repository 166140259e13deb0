import { Logger, SilentLogger, eventBase } from '@testbuilder/shared';
import { countMatching, listMatching, removeFiles } from '../artifacts/files';
import {
  PAN_FILE,
  cleanupSourcePattern,
  parseModelId,
  summaryPattern,
  trailPattern,
} from '../naming/scheme';

export interface CleanupReport {
  model: string;
  trailCount: number;
  removed: string[];
}

/**
 * Removes the checker and generator output for a model from `workDir`: the
 * `pan` verifier, trails, spin summaries and the generated trail sources.
 *
 * Whether the bare `tr-<model>.c` or the indexed `tr-<model>-*.c` files go is
 * decided from the trails present now, not those present at generation time.
 * The manifest is never touched.
 */
export async function cleanModel(
  workDir: string,
  model: string,
  logger: Logger = new SilentLogger(),
): Promise<CleanupReport> {
  const id = parseModelId(model);
  logger.info(`Removing spin and test files for ${id}`);

  const trailCount = await countMatching(workDir, trailPattern(id));
  const files = await listMatching(workDir, [
    PAN_FILE,
    trailPattern(id),
    summaryPattern(id),
    cleanupSourcePattern(id, trailCount),
  ]);
  await removeFiles(workDir, files);

  logger.log({
    ...eventBase(id),
    type: 'CleanupCompleted',
    payload: { removed: files, trailCount },
  });
  return { model: id, trailCount, removed: files };
}
