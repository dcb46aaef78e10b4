import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadEngineError, NetworkError, StorageError, errorMessage } from '../utils/errors.js';

/**
 * File system collaborator, scoped to the downloads root.
 * Failures surface as a StorageError, except a source stream that dies
 * mid-body in `writeStream`, which is a NetworkError.
 */
export interface FileStorage {
  readonly root: string;
  resolve(...segments: string[]): string;
  ensureDir(dir: string): Promise<void>;
  /** Delete then create, discarding anything a previous attempt left behind */
  recreateDir(dir: string): Promise<void>;
  writeFile(filePath: string, data: Buffer | string): Promise<void>;
  writeStream(filePath: string, source: Readable, onBytes?: (written: number) => void, signal?: AbortSignal): Promise<number>;
  /** Byte-for-byte append of `sources` into `destination`, in order. Returns the final size */
  concat(destination: string, sources: string[]): Promise<number>;
  size(filePath: string): Promise<number | null>;
  readText(filePath: string): Promise<string>;
  remove(target: string): Promise<void>;
  listDirectories(dir: string): Promise<string[]>;
}

export class NodeFileStorage implements FileStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(...segments: string[]): string {
    return path.join(this.root, ...segments);
  }

  async ensureDir(dir: string): Promise<void> {
    await this.run(dir, 'create directory', () => fsPromises.mkdir(this.scoped(dir), { recursive: true }));
  }

  async recreateDir(dir: string): Promise<void> {
    await this.remove(dir);
    await this.ensureDir(dir);
  }

  async writeFile(filePath: string, data: Buffer | string): Promise<void> {
    await this.run(filePath, 'write', () => fsPromises.writeFile(this.scoped(filePath), data));
  }

  async writeStream(
    filePath: string,
    source: Readable,
    onBytes?: (written: number) => void,
    signal?: AbortSignal
  ): Promise<number> {
    let written = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        written += chunk.length;
        onBytes?.(written);
        callback(null, chunk);
      },
    });

    const sourceErrors: unknown[] = [];
    source.once('error', (error) => {
      sourceErrors.push(error);
    });

    await this.run(filePath, 'write', async () => {
      try {
        await pipeline(source, counter, fs.createWriteStream(this.scoped(filePath)), { signal });
      } catch (error) {
        const [sourceError] = sourceErrors;
        if (sourceErrors.length > 0 && !signal?.aborted) {
          throw new NetworkError(
            `Stream interrupted after ${written} bytes: ${errorMessage(sourceError)}`,
            undefined,
            undefined,
            { cause: sourceError }
          );
        }
        throw error;
      }
    });
    return written;
  }

  async concat(destination: string, sources: string[]): Promise<number> {
    return this.run(destination, 'merge into', async () => {
      const handle = await fsPromises.open(this.scoped(destination), 'w');
      let total = 0;
      try {
        for (const source of sources) {
          const bytes = await fsPromises.readFile(this.scoped(source));
          await handle.write(bytes);
          total += bytes.length;
        }
      } finally {
        await handle.close();
      }
      return total;
    });
  }

  async size(filePath: string): Promise<number | null> {
    try {
      const stats = await fsPromises.stat(this.scoped(filePath));
      return stats.isFile() ? stats.size : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageError(`Failed to stat ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
    }
  }

  async readText(filePath: string): Promise<string> {
    return this.run(filePath, 'read', () => fsPromises.readFile(this.scoped(filePath), 'utf-8'));
  }

  async remove(target: string): Promise<void> {
    await this.run(target, 'delete', () => fsPromises.rm(this.scoped(target), { recursive: true, force: true }));
  }

  async listDirectories(dir: string): Promise<string[]> {
    try {
      const entries = await fsPromises.readdir(this.scoped(dir), { withFileTypes: true });
      return entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageError(`Failed to list ${dir}: ${errorMessage(error)}`, dir, { cause: error });
    }
  }

  // Refuse anything that resolves outside the downloads root
  private scoped(target: string): string {
    const resolved = path.resolve(this.root, target);
    const relative = path.relative(this.root, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new StorageError(`Path escapes downloads root: ${target}`, target);
    }
    return resolved;
  }

  private async run<T>(target: string, action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof DownloadEngineError) throw error;
      throw new StorageError(`Failed to ${action} ${target}: ${errorMessage(error)}`, target, { cause: error });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
