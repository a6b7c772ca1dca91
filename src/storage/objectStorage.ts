import { promises as fs } from "fs";
import path from "path";
import { listFilesRecursive, pathExists, writeBinary } from "../utils/fs";

/**
 * Flat key/bytes store. Keys use `/` separators whatever the backend.
 */
export interface ObjectStorage {
  put(key: string, bytes: Buffer): Promise<void>;
  get(key: string): Promise<Buffer>;
  /** Keys under `prefix`, sorted. */
  list(prefix: string): Promise<string[]>;
  remove(key: string): Promise<void>;
  /** Printable location of a key, for logs and run status. */
  locate(key: string): string;
}

export class LocalObjectStorage implements ObjectStorage {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    await writeBinary(this.resolve(key), bytes);
  }

  async get(key: string): Promise<Buffer> {
    return fs.readFile(this.resolve(key));
  }

  async list(prefix: string): Promise<string[]> {
    const dir = this.resolve(prefix);
    if (!(await pathExists(dir))) return [];
    const files = await listFilesRecursive(dir, () => true);
    return files
      .map((filePath) => path.relative(this.rootDir, filePath).split(path.sep).join("/"))
      .sort();
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }

  locate(key: string): string {
    return this.resolve(key);
  }

  private resolve(key: string): string {
    return path.join(this.rootDir, ...key.split("/"));
  }
}
