import { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SerialQueue } from '../common/utils/serial-queue';
import { KeyValueStore } from './key-value-store.interface';
import { CorruptStateError } from './storage.errors';

type Entries = Record<string, string>;

// All keys live in one JSON object file.
// Writes go to a temp file first, then rename over the target.
// Reads of a corrupt file throw; a write moves the corrupt file aside
// (<file>.corrupt-<epoch ms>) and starts from an empty object.
export class FileKeyValueStore implements KeyValueStore {
  private readonly logger = new Logger(FileKeyValueStore.name);
  private readonly writes = new SerialQueue();

  constructor(private readonly filePath: string) {}

  async getItem(key: string): Promise<string | null> {
    const entries = await this.readEntries();
    return entries[key] ?? null;
  }

  setItem(key: string, value: string): Promise<void> {
    return this.writes.run(async () => {
      const entries = await this.readEntriesForWrite();
      entries[key] = value;
      await this.writeEntries(entries);
    });
  }

  private async readEntriesForWrite(): Promise<Entries> {
    try {
      return await this.readEntries();
    } catch (error) {
      if (!(error instanceof CorruptStateError)) {
        throw error;
      }
      const asidePath = `${this.filePath}.corrupt-${Date.now()}`;
      await rename(this.filePath, asidePath);
      this.logger.error(`${error.message}; moved it to ${asidePath} and started a new state file`);
      return {};
    }
  }

  private async readEntries(): Promise<Entries> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new CorruptStateError(`State file ${this.filePath} is not valid JSON`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new CorruptStateError(`State file ${this.filePath} is not a JSON object`);
    }

    const entries: Entries = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== 'string') {
        throw new CorruptStateError(`State file ${this.filePath} has a non-string value for "${key}"`);
      }
      entries[key] = value;
    }
    return entries;
  }

  private async writeEntries(entries: Entries): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(entries, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
    this.logger.debug(`Wrote ${Object.keys(entries).length} key(s) to ${this.filePath}`);
  }
}

// fs errors may come from another realm (e.g. under Jest), so no instanceof Error
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
