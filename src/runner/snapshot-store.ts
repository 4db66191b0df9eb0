import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SnapshotStoreError } from './errors.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

export interface SnapshotKey {
  testId: string;
  ordinal: number;
}

export type CreateResult = { created: true } | { created: false; existing: string };

/**
 * Golden values keyed by (test id, case ordinal).
 * Reads may run concurrently; `create` never overwrites, `put` only works in update mode.
 */
export interface SnapshotStore {
  readonly updateMode: boolean;
  get(key: SnapshotKey): Promise<string | undefined>;
  create(key: SnapshotKey, value: string): Promise<CreateResult>;
  put(key: SnapshotKey, value: string): Promise<void>;
  flush(): Promise<void>;
}

export interface SnapshotStoreOptions {
  updateMode?: boolean;
  logger?: Logger;
}

export function snapshotFileName(key: SnapshotKey): string {
  return `${encodeURIComponent(key.testId)}_case${key.ordinal}.snap`;
}

abstract class BufferedSnapshotStore implements SnapshotStore {
  readonly updateMode: boolean;
  protected readonly logger: Logger;
  private readonly entries = new Map<string, string>();
  private readonly pending = new Map<string, string>();
  private readonly loading = new Map<string, Promise<string | undefined>>();

  constructor(options: SnapshotStoreOptions) {
    this.updateMode = options.updateMode ?? false;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  protected abstract load(fileName: string): Promise<string | undefined>;
  protected abstract persist(fileName: string, value: string): Promise<void>;

  async get(key: SnapshotKey): Promise<string | undefined> {
    const fileName = snapshotFileName(key);
    if (this.entries.has(fileName)) {
      return this.entries.get(fileName);
    }

    // Concurrent readers of the same key share one load
    let loading = this.loading.get(fileName);
    if (!loading) {
      loading = this.load(fileName).finally(() => this.loading.delete(fileName));
      this.loading.set(fileName, loading);
    }
    const value = await loading;

    // A write may have landed while the load was in flight
    if (this.entries.has(fileName)) {
      return this.entries.get(fileName);
    }
    if (value !== undefined) {
      this.entries.set(fileName, value);
    }
    return value;
  }

  async create(key: SnapshotKey, value: string): Promise<CreateResult> {
    const fileName = snapshotFileName(key);
    await this.get(key);
    // Read again after the await: another worker may have created the key meanwhile
    const existing = this.entries.get(fileName);

    if (existing !== undefined) {
      if (!this.pending.has(fileName)) {
        return { created: false, existing };
      }
      // Another worker created this key during the same run. Last writer wins.
      if (existing !== value) {
        this.logger.warn(
          `⚠️  Snapshot ${fileName} was created twice in one run with different content; provider output looks non-deterministic`
        );
      }
    }

    this.entries.set(fileName, value);
    this.pending.set(fileName, value);
    return { created: true };
  }

  async put(key: SnapshotKey, value: string): Promise<void> {
    if (!this.updateMode) {
      throw new SnapshotStoreError(
        `Refusing to overwrite snapshot ${snapshotFileName(key)} outside update mode`
      );
    }
    const fileName = snapshotFileName(key);
    this.entries.set(fileName, value);
    this.pending.set(fileName, value);
  }

  /**
   * Write every pending entry. An entry leaves the pending set only once it is
   * on disk, so a failed write is retried by the next flush and never stops the
   * entries after it.
   */
  async flush(): Promise<void> {
    const failures: string[] = [];
    for (const [fileName, value] of Array.from(this.pending.entries())) {
      try {
        await this.persist(fileName, value);
      } catch (error) {
        failures.push(error instanceof Error ? error.message : String(error));
        continue;
      }
      // A create or put during the write leaves a newer value pending
      if (this.pending.get(fileName) === value) {
        this.pending.delete(fileName);
      }
    }
    if (failures.length > 0) {
      throw new SnapshotStoreError(failures.join('; '));
    }
  }
}

/**
 * Snapshots stored one file per key under a directory. Writes are staged in
 * memory and land on disk at `flush()`, each through a temp file and rename.
 */
export class FileSnapshotStore extends BufferedSnapshotStore {
  constructor(
    readonly directory: string,
    options: SnapshotStoreOptions = {}
  ) {
    super(options);
  }

  static async open(directory: string, options: SnapshotStoreOptions = {}): Promise<FileSnapshotStore> {
    await mkdir(directory, { recursive: true });
    return new FileSnapshotStore(directory, options);
  }

  protected async load(fileName: string): Promise<string | undefined> {
    try {
      return await readFile(join(this.directory, fileName), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw new SnapshotStoreError(
        `Failed to read snapshot ${fileName}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  protected async persist(fileName: string, value: string): Promise<void> {
    const target = join(this.directory, fileName);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, value, 'utf8');
      await rename(temp, target);
    } catch (error) {
      throw new SnapshotStoreError(
        `Failed to write snapshot ${fileName}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

export class MemorySnapshotStore extends BufferedSnapshotStore {
  /** What has been flushed, keyed by snapshot file name */
  readonly persisted: Map<string, string>;

  constructor(initial: Iterable<[SnapshotKey, string]> = [], options: SnapshotStoreOptions = {}) {
    super(options);
    this.persisted = new Map(Array.from(initial, ([key, value]) => [snapshotFileName(key), value]));
  }

  protected async load(fileName: string): Promise<string | undefined> {
    return this.persisted.get(fileName);
  }

  protected async persist(fileName: string, value: string): Promise<void> {
    this.persisted.set(fileName, value);
  }
}
