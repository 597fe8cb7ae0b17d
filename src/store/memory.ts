import * as path from 'path';
import { isValidSize, type ArtifactKey, type ArtifactStore } from './artifacts.js';

/** In-memory artifact store keyed by path; used with the fake media engine. */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly files = new Map<string, Buffer>();

  /** Write raw bytes at a path, bypassing keys (fake engine outputs, fixtures). */
  writeFile(filePath: string, data: Buffer | string): void {
    this.files.set(filePath, typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
  }

  /** Write `size` zero bytes at a path. */
  writeBytes(filePath: string, size: number): void {
    this.files.set(filePath, Buffer.alloc(size));
  }

  has(filePath: string): boolean {
    return this.files.has(filePath);
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  exists(k: ArtifactKey): boolean {
    return isValidSize(k.kind, this.size(k));
  }

  size(k: ArtifactKey): number | null {
    return this.files.get(k.path)?.length ?? null;
  }

  open(k: ArtifactKey): Buffer | null {
    return this.files.get(k.path) ?? null;
  }

  put(k: ArtifactKey, data: Buffer | string): void {
    this.writeFile(k.path, data);
  }

  copy(from: ArtifactKey, to: ArtifactKey): void {
    const data = this.files.get(from.path);
    if (!data) throw new Error(`ENOENT: no such file, copy '${from.path}'`);
    this.files.set(to.path, Buffer.from(data));
  }

  move(from: ArtifactKey, to: ArtifactKey): void {
    const data = this.files.get(from.path);
    if (!data) throw new Error(`ENOENT: no such file, rename '${from.path}'`);
    this.files.delete(from.path);
    this.files.set(to.path, data);
  }

  remove(k: ArtifactKey): void {
    const prefix = k.path + path.sep;
    for (const p of [...this.files.keys()]) {
      if (p === k.path || p.startsWith(prefix)) this.files.delete(p);
    }
  }

  prepare(_k: ArtifactKey): void {
    // directories are implicit
  }
}
