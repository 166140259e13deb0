import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  MissingInputError,
  ManifestParseError,
  ProcessError,
  ToolError,
  FilesystemError,
  isUserError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProcessError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ToolError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('MissingInputError', () => {
  it('should list every missing file', () => {
    const error = new MissingInputError('mutex', ['mutex.pml', 'mutex-rfn.yml']);
    expect(error.code).toBe('MissingInput');
    expect(error.name).toBe('MissingInputError');
    expect(error.message).toBe('Model "mutex" is missing 2 required file(s)');
    expect(error.missingFiles).toEqual(['mutex.pml', 'mutex-rfn.yml']);
    expect(error.details).toEqual({ missing: ['mutex.pml', 'mutex-rfn.yml'] });
  });
});

describe('ManifestParseError', () => {
  it('should name the manifest path', () => {
    const error = new ManifestParseError('/tmp/model-0.yml', 'file not found');
    expect(error.code).toBe('ParseError');
    expect(error.path).toBe('/tmp/model-0.yml');
    expect(error.message).toBe('Cannot read manifest /tmp/model-0.yml: file not found');
  });
});

describe('ProcessError', () => {
  it('should carry the exit code', () => {
    const error = new ProcessError('spin exited with 3', { exitCode: 3 });
    expect(error.code).toBe('ProcessError');
    expect(error.exitCode).toBe(3);
  });
});

describe('FilesystemError', () => {
  it('should default details to the path', () => {
    const error = new FilesystemError('/target/tr-a.c', 'copy failed');
    expect(error.code).toBe('FilesystemError');
    expect(error.details).toEqual({ path: '/target/tr-a.c' });
  });
});

describe('isUserError', () => {
  it('should classify config and usage errors as user-correctable', () => {
    expect(isUserError(new ConfigError('x'))).toBe(true);
    expect(isUserError(new UsageError('x'))).toBe(true);
    expect(isUserError(new ToolError('x'))).toBe(false);
    expect(isUserError(new Error('x'))).toBe(false);
  });
});
