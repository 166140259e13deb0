import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import {
  Logger,
  ManifestParseError,
  SilentLogger,
  atomicWrite,
  eventBase,
} from '@testbuilder/shared';
import { SourceSet } from './source-set';

export const SOURCE_KEY = 'source';

/**
 * A build manifest: the `source` list plus every other key of the document,
 * which is carried through untouched.
 */
export interface BuildManifest {
  /** The document as loaded, keys in their original order */
  readonly document: Readonly<Record<string, unknown>>;
  readonly sources: SourceSet;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function parseManifest(path: string, content: string): BuildManifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: path });
  } catch (error: unknown) {
    if (error instanceof yaml.YAMLException) {
      throw new ManifestParseError(path, error.message, { cause: error });
    }
    throw error;
  }
  if (!isRecord(parsed)) {
    throw new ManifestParseError(path, 'document is not a mapping');
  }
  const source = parsed[SOURCE_KEY];
  if (source === undefined) {
    throw new ManifestParseError(path, `missing "${SOURCE_KEY}" list`);
  }
  if (!isStringList(source)) {
    throw new ManifestParseError(path, `"${SOURCE_KEY}" must be a list of strings`);
  }
  return { document: parsed, sources: SourceSet.from(source) };
}

export function serializeManifest(manifest: BuildManifest): string {
  // Reassigning an existing key keeps its position in the document.
  return yaml.dump({ ...manifest.document, [SOURCE_KEY]: manifest.sources.toArray() });
}

export async function loadManifest(path: string): Promise<BuildManifest> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (error: unknown) {
    throw new ManifestParseError(path, 'file cannot be read', { cause: error });
  }
  return parseManifest(path, content);
}

export async function saveManifest(path: string, manifest: BuildManifest): Promise<void> {
  await atomicWrite(path, serializeManifest(manifest));
}

/**
 * Set union of the current sources and `paths`. Duplicates collapse; merging
 * the same paths again changes nothing.
 */
export function mergeSources(manifest: BuildManifest, paths: Iterable<string>): BuildManifest {
  return { ...manifest, sources: manifest.sources.union(paths) };
}

/**
 * Replaces every tracked source with `baseline`.
 */
export function resetSources(manifest: BuildManifest, baseline: string): BuildManifest {
  return { ...manifest, sources: SourceSet.from([baseline]) };
}

/**
 * The manifest at one path. Each operation reads the file, changes it in
 * memory and writes it back; there is no locking between processes, so two
 * runs against the same manifest may lose updates.
 */
export class ManifestStore {
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? new SilentLogger();
  }

  load(): Promise<BuildManifest> {
    return loadManifest(this.path);
  }

  save(manifest: BuildManifest): Promise<void> {
    return saveManifest(this.path, manifest);
  }

  async update(change: (manifest: BuildManifest) => BuildManifest): Promise<BuildManifest> {
    const next = change(await this.load());
    await this.save(next);
    return next;
  }

  async addSources(paths: string[], model?: string): Promise<BuildManifest> {
    const next = await this.update((manifest) => mergeSources(manifest, paths));
    this.logger.trace(
      {
        ...eventBase(model),
        type: 'ManifestUpdated',
        payload: { path: this.path, added: [...paths].sort(), total: next.sources.size },
      },
      `Updated ${this.path}${model ? ` for model ${model}` : ''}`,
    );
    return next;
  }

  async reset(baseline: string): Promise<BuildManifest> {
    let dropped = 0;
    const next = await this.update((manifest) => {
      dropped = manifest.sources.size;
      return resetSources(manifest, baseline);
    });
    this.logger.trace(
      { ...eventBase(), type: 'ManifestReset', payload: { path: this.path, baseline, dropped } },
      `Zeroed ${this.path}`,
    );
    return next;
  }
}
