/**
 * ResultCache - Remembers finished files by content fingerprint.
 *
 * Stored as one local JSON file. A fingerprint covers the file text and
 * every setting that changes output, so a hit can be reused verbatim on
 * `--resume`. The pipeline treats entries as opaque.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DocstringResult, InjectionEdit, SkippedElement } from '../types';

export interface CacheEntry {
  path: string;
  output: string;
  /** Results without refinement history */
  results: DocstringResult[];
  skipped: SkippedElement[];
  edits: InjectionEdit[];
  stored_at: string;
}

export interface CacheConfig {
  storagePath: string;
}

const DEFAULT_CONFIG: CacheConfig = {
  storagePath: path.join('.docsmith', 'cache.json'),
};

const CACHE_VERSION = '1.0';

interface CacheFile {
  version: string;
  updated_at: string;
  entries: Array<{ fingerprint: string } & CacheEntry>;
}

export class ResultCache {
  private config: CacheConfig;
  private entries: Map<string, CacheEntry>;
  private dirty: boolean = false;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.entries = new Map();
    this.load();
  }

  get size(): number {
    return this.entries.size;
  }

  get(fingerprint: string): CacheEntry | undefined {
    return this.entries.get(fingerprint);
  }

  set(fingerprint: string, entry: Omit<CacheEntry, 'stored_at'>): void {
    this.entries.set(fingerprint, {
      ...entry,
      results: entry.results.map((r) => ({ ...r, history: [] })),
      stored_at: new Date().toISOString(),
    });
    this.dirty = true;
  }

  clear(): void {
    this.entries.clear();
    this.dirty = true;
  }

  /**
   * Write pending changes. Failures are reported, not thrown: a lost
   * cache only costs a recomputation.
   */
  save(): void {
    if (!this.dirty) return;

    try {
      const dir = path.dirname(this.config.storagePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const data: CacheFile = {
        version: CACHE_VERSION,
        updated_at: new Date().toISOString(),
        entries: Array.from(this.entries.entries()).map(([fingerprint, entry]) => ({
          fingerprint,
          ...entry,
        })),
      };

      fs.writeFileSync(this.config.storagePath, JSON.stringify(data, null, 2));
      this.dirty = false;
    } catch (error) {
      console.error('Failed to save result cache:', error);
    }
  }

  private load(): void {
    try {
      if (!fs.existsSync(this.config.storagePath)) {
        return;
      }

      const data: unknown = JSON.parse(fs.readFileSync(this.config.storagePath, 'utf-8'));
      if (!isCacheFile(data) || data.version !== CACHE_VERSION) {
        console.error(`Ignoring result cache at ${this.config.storagePath}: unrecognised format`);
        return;
      }

      for (const item of data.entries) {
        const { fingerprint, ...entry } = item;
        this.entries.set(fingerprint, entry);
      }
    } catch (error) {
      console.error('Failed to load result cache:', error);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheEntry(value: unknown): value is { fingerprint: string } & CacheEntry {
  return (
    isRecord(value) &&
    typeof value['fingerprint'] === 'string' &&
    typeof value['path'] === 'string' &&
    typeof value['output'] === 'string' &&
    Array.isArray(value['results']) &&
    Array.isArray(value['skipped']) &&
    Array.isArray(value['edits'])
  );
}

function isCacheFile(value: unknown): value is CacheFile {
  return (
    isRecord(value) &&
    typeof value['version'] === 'string' &&
    Array.isArray(value['entries']) &&
    value['entries'].every(isCacheEntry)
  );
}
