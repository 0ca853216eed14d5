import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheError } from '../errors.js';
import { isErrnoException, isJsonValue, isStringRecord } from '../utils/json.js';
import type { CacheEntry, CacheResult, CacheStats, ResponseCache } from './cache.js';
import type { JsonValue } from '../types/index.js';

interface StoredRecord {
  signature: string;
  storedAt: string;
  status_code: number;
  data: JsonValue;
  headers: Record<string, string>;
}

export interface FileCacheOptions {
  directory?: string;
  logger?: (message: string) => void;
}

const RECORD_EXTENSION = '.json';

export const DEFAULT_CACHE_DIR = path.join(os.tmpdir(), 'econops_cache');

export function sanitizeSignature(signature: string): string {
  return signature.replace(/[^a-zA-Z0-9]/g, '_');
}

export class FileCache implements ResponseCache {
  readonly directory: string;
  private readonly logger: ((message: string) => void) | undefined;
  private ready: Promise<void> | undefined;

  constructor(options: FileCacheOptions = {}) {
    this.directory = options.directory ?? DEFAULT_CACHE_DIR;
    this.logger = options.logger;
  }

  async get(signature: string): Promise<CacheResult<CacheEntry | null>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(signature), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { ok: true, value: null };
      }
      return { ok: false, error: new CacheError('get', describe(error), { cause: error }) };
    }

    let record: StoredRecord;
    try {
      record = parseRecord(raw);
    } catch (error) {
      return {
        ok: false,
        error: new CacheError('get', `corrupt record: ${describe(error)}`, { cause: error }),
      };
    }

    if (record.signature !== signature) {
      return { ok: false, error: new CacheError('get', 'record belongs to a different signature') };
    }

    return {
      ok: true,
      value: { statusCode: record.status_code, data: record.data, headers: record.headers },
    };
  }

  async put(signature: string, entry: CacheEntry): Promise<CacheResult<void>> {
    const record: StoredRecord = {
      signature,
      storedAt: new Date().toISOString(),
      status_code: entry.statusCode,
      data: entry.data,
      headers: entry.headers,
    };

    const text = JSON.stringify(record);
    try {
      await this.ensureDirectory();
      await fs.writeFile(this.recordPath(signature), text, 'utf8');
    } catch (error) {
      return { ok: false, error: new CacheError('put', describe(error), { cause: error }) };
    }

    this.logger?.(`Cached ${text.length} characters in ${this.directory}`);
    return { ok: true, value: undefined };
  }

  async clear(): Promise<CacheResult<number>> {
    try {
      const files = await this.listRecords();
      await Promise.all(files.map((file) => fs.rm(path.join(this.directory, file), { force: true })));
      this.logger?.(`Removed ${files.length} cached responses from ${this.directory}`);
      return { ok: true, value: files.length };
    } catch (error) {
      return { ok: false, error: new CacheError('clear', describe(error), { cause: error }) };
    }
  }

  async stats(): Promise<CacheStats> {
    try {
      const files = await this.listRecords();
      const sizes = await Promise.all(
        files.map(async (file) => (await fs.stat(path.join(this.directory, file))).size),
      );
      return {
        directory: this.directory,
        count: files.length,
        totalBytes: sizes.reduce((sum, size) => sum + size, 0),
      };
    } catch (error) {
      this.logger?.(`Could not read cache statistics: ${describe(error)}`);
      return { directory: 'Not available', count: 0, totalBytes: 0 };
    }
  }

  private async listRecords(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.directory);
      return names.filter((name) => name.endsWith(RECORD_EXTENSION));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = undefined;
          throw error;
        },
      );
    }
    return this.ready;
  }

  private recordPath(signature: string): string {
    return path.join(this.directory, `${sanitizeSignature(signature)}${RECORD_EXTENSION}`);
  }
}

function parseRecord(raw: string): StoredRecord {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new TypeError('record must be an object');
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const signature = fields.get('signature');
  const storedAt = fields.get('storedAt');
  const statusCode = fields.get('status_code');
  const data = fields.get('data');
  const headers = fields.get('headers');
  if (typeof signature !== 'string' || typeof storedAt !== 'string') {
    throw new TypeError('record is missing its signature or timestamp');
  }
  if (typeof statusCode !== 'number' || !Number.isInteger(statusCode)) {
    throw new TypeError('status_code must be an integer');
  }
  if (!isJsonValue(data)) {
    throw new TypeError('data must be a JSON value');
  }
  if (!isStringRecord(headers)) {
    throw new TypeError('headers must map strings to strings');
  }

  return { signature, storedAt, status_code: statusCode, data, headers };
}

// Node's fs messages embed the record path, which is derived from the signature.
function describe(error: unknown): string {
  if (isErrnoException(error)) {
    return `${error.code ?? 'error'} during ${error.syscall ?? 'file access'}`;
  }
  return error instanceof Error ? error.message : String(error);
}
