import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ContactTables } from '../src/store/contact-tables.js';

export const ADDRESS_A = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
export const ADDRESS_B = '0x1111111111111111111111111111111111111111';

export interface SeedContact {
  name?: string;
  /** Auxiliary slot of the name row. */
  aux?: string;
  phone?: string;
  email?: string;
  photoUri?: string;
}

/**
 * Insert a contact with the given rows. A name row is written only when
 * `name` or `aux` is given.
 */
export function seedContact(tables: ContactTables, seed: SeedContact): string {
  const id = tables.insertContact();
  if (seed.name !== undefined || seed.aux !== undefined) {
    tables.insertRow(id, { mimeType: 'structured-name', data1: seed.name, data15: seed.aux });
  }
  if (seed.phone !== undefined) tables.insertRow(id, { mimeType: 'phone', data1: seed.phone });
  if (seed.email !== undefined) tables.insertRow(id, { mimeType: 'email', data1: seed.email });
  if (seed.photoUri !== undefined) tables.insertRow(id, { mimeType: 'photo', photoUri: seed.photoUri });
  return id;
}

/** Create a temp directory for file-backed store tests. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ethcontacts-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}
