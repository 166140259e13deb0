import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OutputRenderer } from './renderer';

const stripAnsi = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '');

describe('OutputRenderer', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(stripAnsi(args.map(String).join(' ')));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    new OutputRenderer(true).render({ status: 'SUCCESS', command: 'zero', summary: 'done' });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({ status: 'SUCCESS', command: 'zero', summary: 'done' });
  });

  it('renders the summary and non-empty file lists', () => {
    new OutputRenderer(false).render({
      status: 'SUCCESS',
      command: 'copy',
      summary: 'Copied 2 file(s) for mutex',
      files: { Copied: ['tr-mutex-0.c', 'tr-mutex-1.c'], Removed: [] },
    });

    expect(lines).toEqual([
      '✅ Copied 2 file(s) for mutex',
      'Copied:',
      '  - tr-mutex-0.c',
      '  - tr-mutex-1.c',
    ]);
  });

  it('truncates long lists', () => {
    const files = Array.from({ length: 12 }, (_, i) => `tr-m-${i}.c`);
    new OutputRenderer(false).render({
      status: 'FAILURE',
      command: 'clean',
      summary: 'x',
      files: { Removed: files },
    });

    expect(lines[0]).toBe('❌ x');
    expect(lines).toHaveLength(2 + 10 + 1);
    expect(lines[lines.length - 1]).toBe('  ... and 2 more.');
  });
});
