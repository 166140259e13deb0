import { describe, it, expect } from 'vitest';
import { SourceSet } from './source-set';

describe('SourceSet', () => {
  it('keeps each path once and reads out sorted', () => {
    const set = SourceSet.from(['tr-b.c', 'tc-a.c', 'tr-b.c']);
    expect(set.size).toBe(2);
    expect(set.toArray()).toEqual(['tc-a.c', 'tr-b.c']);
    expect([...set]).toEqual(['tc-a.c', 'tr-b.c']);
  });

  it('sorts by code unit, so upper case precedes lower case', () => {
    expect(SourceSet.from(['b.c', 'B.c', 'a.c']).toArray()).toEqual(['B.c', 'a.c', 'b.c']);
  });

  it('returns a new set from union and leaves the original alone', () => {
    const base = SourceSet.from(['a.c']);
    const merged = base.union(['b.c', 'a.c']);
    expect(merged.toArray()).toEqual(['a.c', 'b.c']);
    expect(base.toArray()).toEqual(['a.c']);
    expect(merged.has('b.c')).toBe(true);
    expect(base.has('b.c')).toBe(false);
  });

  it('adds in place', () => {
    const set = new SourceSet().add('z.c').addAll(['y.c', 'z.c']);
    expect(set.toArray()).toEqual(['y.c', 'z.c']);
  });
});
