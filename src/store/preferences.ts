import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { PreferenceStore } from '../types/index.js';
import { ensOverridesFrom, ensPreferenceKey } from '../types/index.js';
import { PermissionDeniedError, StoreError, createLogger, describeError, errnoCode } from '../utils/index.js';
import { DEFAULT_PREFS_NAMESPACE, preferencesLockPath, preferencesPath } from './file-layout.js';
import { FileLock } from './lock.js';
import { toStoreError } from './fs-errors.js';

const log = createLogger('preferences');

const preferencesFileSchema = z.record(z.string());

export class InMemoryPreferenceStore implements PreferenceStore {
  readonly name = 'memory-prefs';
  private entries: Map<string, string>;
  private writable = true;

  constructor(initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  /** Simulate a store that refuses writes. */
  setWritable(writable: boolean): void {
    this.writable = writable;
  }

  async getEnsOverride(contactId: string): Promise<string | undefined> {
    return this.entries.get(ensPreferenceKey(contactId));
  }

  async listEnsOverrides(): Promise<Map<string, string>> {
    return ensOverridesFrom(this.entries);
  }

  async setEnsOverride(contactId: string, ensName: string): Promise<void> {
    if (!this.writable) throw new PermissionDeniedError(this.name, 'write');
    this.entries.set(ensPreferenceKey(contactId), ensName);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}

/** Preference namespace persisted as `prefs/<namespace>.json` under the store directory. */
export class FilePreferenceStore implements PreferenceStore {
  readonly name: string;
  private filePath: string;
  private lock: FileLock;

  constructor(storePath: string, namespace: string = DEFAULT_PREFS_NAMESPACE) {
    this.name = `prefs:${namespace}`;
    this.filePath = preferencesPath(storePath, namespace);
    this.lock = new FileLock(preferencesLockPath(storePath, namespace));
  }

  async getEnsOverride(contactId: string): Promise<string | undefined> {
    const entries = await this.load();
    return entries[ensPreferenceKey(contactId)];
  }

  async listEnsOverrides(): Promise<Map<string, string>> {
    return ensOverridesFrom(Object.entries(await this.load()));
  }

  async setEnsOverride(contactId: string, ensName: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await this.lock.withLock(async () => {
        const entries = await this.load();
        entries[ensPreferenceKey(contactId)] = ensName;
        await fs.writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf-8');
      });
    } catch (err) {
      throw toStoreError(this.name, 'write', err);
    }
    log.debug('Saved ENS override for contact', contactId);
  }

  private async load(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return {};
      throw toStoreError(this.name, 'read', err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`[${this.name}] ${this.filePath} is not valid JSON: ${describeError(err)}`);
    }
    const parsed = preferencesFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`[${this.name}] ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
