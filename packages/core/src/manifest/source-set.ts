/**
 * Set of manifest source paths. Insertion order is irrelevant: paths are
 * always read out sorted, and each path appears once.
 */
export class SourceSet implements Iterable<string> {
  private readonly paths: Set<string>;

  constructor(paths: Iterable<string> = []) {
    this.paths = new Set(paths);
  }

  static from(paths: Iterable<string>): SourceSet {
    return new SourceSet(paths);
  }

  get size(): number {
    return this.paths.size;
  }

  has(path: string): boolean {
    return this.paths.has(path);
  }

  add(path: string): this {
    this.paths.add(path);
    return this;
  }

  addAll(paths: Iterable<string>): this {
    for (const path of paths) {
      this.paths.add(path);
    }
    return this;
  }

  union(paths: Iterable<string>): SourceSet {
    return new SourceSet(this.paths).addAll(paths);
  }

  toArray(): string[] {
    return [...this.paths].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.toArray()[Symbol.iterator]();
  }
}
