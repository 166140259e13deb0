import { UsageError } from '@testbuilder/shared';

/**
 * A single-level file name pattern. `*` matches any run of characters,
 * including none; there is no other wildcard.
 */
export type ArtifactPattern = string;

/** The checker's compiled verifier, left in the working directory */
export const PAN_FILE = 'pan';

export interface ReadinessFile {
  file: string;
  role: 'description' | 'precondition' | 'postcondition' | 'run' | 'refinement';
  /** Reported when the file is absent */
  cause: string;
}

/**
 * Validates a model identifier. It is the stem of every per-model file, so
 * it must stay inside the working directory.
 */
export function parseModelId(model: string): string {
  if (model.length === 0) {
    throw new UsageError('Model name must not be empty');
  }
  if (/[\\/\0]/.test(model) || model === '.' || model === '..') {
    throw new UsageError(`Invalid model name "${model}": must be a plain file stem`);
  }
  return model;
}

export function descriptionFile(model: string): string {
  return `${model}.pml`;
}

export function readinessFiles(model: string): ReadinessFile[] {
  return [
    { file: descriptionFile(model), role: 'description', cause: 'description file missing' },
    { file: `${model}-pre.h`, role: 'precondition', cause: 'precondition header missing' },
    { file: `${model}-post.h`, role: 'postcondition', cause: 'postcondition header missing' },
    { file: `${model}-run.h`, role: 'run', cause: 'run header missing' },
    { file: `${model}-rfn.yml`, role: 'refinement', cause: 'refinement file missing' },
  ];
}

export function trailPattern(model: string): ArtifactPattern {
  return `${model}*.trail`;
}

export function summaryPattern(model: string): ArtifactPattern {
  return `${model}*.spn`;
}

/**
 * Spin summary for a trail. A lone trail gets the bare name; otherwise the
 * name carries the 0-based offset of the trail.
 */
export function summaryFile(model: string, offset?: number): string {
  return offset === undefined ? `${model}.spn` : `${model}-${offset}.spn`;
}

/**
 * Checker flag replaying one trail. The checker counts trails from 1, so
 * offset 0 selects `-t1`.
 */
export function trailSelector(offset: number): string {
  return `-t${offset + 1}`;
}

/** Every file the generator emits for a model: sources and headers */
export function generatedPatterns(model: string): ArtifactPattern[] {
  return [`tr-${model}*.c`, `tr-${model}*.h`, `tc-${model}*.c`];
}

/** Generated files that are build sources, i.e. tracked in the manifest */
export function trackedSourcePatterns(model: string): ArtifactPattern[] {
  return [`tr-${model}*.c`, `tc-${model}*.c`];
}

/**
 * Generated trail source removed by `clean`. The choice follows the trail
 * count seen at cleanup time, which may differ from the one seen when the
 * sources were generated.
 */
export function cleanupSourcePattern(model: string, trailCount: number): ArtifactPattern {
  return trailCount === 1 ? `tr-${model}.c` : `tr-${model}-*.c`;
}

export function matchesPattern(pattern: ArtifactPattern, name: string): boolean {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`, 's').test(name);
}

export function matchesAny(patterns: ArtifactPattern[], name: string): boolean {
  return patterns.some((pattern) => matchesPattern(pattern, name));
}
