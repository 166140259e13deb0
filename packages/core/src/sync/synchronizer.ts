import { Logger, SilentLogger, eventBase, relative } from '@testbuilder/shared';
import { copyFiles, listMatching, removeFiles } from '../artifacts/files';
import { ManifestStore } from '../manifest/store';
import {
  generatedPatterns,
  matchesAny,
  parseModelId,
  trackedSourcePatterns,
} from '../naming/scheme';

export interface SyncTarget {
  /** Directory receiving the generated files */
  targetDir: string;
  /** Root the manifest paths are relative to */
  targetRoot: string;
}

export interface SyncReport {
  model: string;
  /** Stale files deleted from the target directory */
  removed: string[];
  /** Fresh files copied from the working directory */
  copied: string[];
  /** Manifest entries merged for the copied sources */
  manifestSources: string[];
}

/**
 * Replaces a model's generated files in the target tree with the fresh set
 * and records the fresh sources in the manifest.
 *
 * Nothing is rolled back when a step fails; running the sync again converges
 * on the same end state. Manifest entries of deleted stale files are kept.
 */
export class ArtifactSynchronizer {
  private readonly logger: Logger;

  constructor(
    private readonly manifest: ManifestStore,
    logger?: Logger,
  ) {
    this.logger = logger ?? new SilentLogger();
  }

  async sync(workDir: string, model: string, target: SyncTarget): Promise<SyncReport> {
    const id = parseModelId(model);
    const patterns = generatedPatterns(id);
    const logger = this.logger.child({ model: id });

    logger.info(`Removing old files for model ${id}`);
    const removed = await listMatching(target.targetDir, patterns);
    await removeFiles(target.targetDir, removed);

    logger.info(`Copying new files for model ${id}`);
    const copied = await listMatching(workDir, patterns);
    await copyFiles(workDir, target.targetDir, copied);

    const prefix = relative(target.targetRoot, target.targetDir);
    const manifestSources = copied
      .filter((file) => matchesAny(trackedSourcePatterns(id), file))
      .map((file) => (prefix ? `${prefix}/${file}` : file));
    await this.manifest.addSources(manifestSources, id);

    logger.log({
      ...eventBase(id),
      type: 'ArtifactsSynchronized',
      payload: { targetDir: target.targetDir, removed, copied },
    });

    return { model: id, removed, copied, manifestSources };
  }
}
