import * as path from 'node:path';

export const CONTACTS_FILE = 'contacts.json';
export const PREFS_DIR = 'prefs';
export const DEFAULT_PREFS_NAMESPACE = 'contact_prefs';

export function contactsPath(storePath: string): string {
  return path.join(storePath, CONTACTS_FILE);
}

export function contactsLockPath(storePath: string): string {
  return path.join(storePath, `.${CONTACTS_FILE}.lock`);
}

export function preferencesPath(storePath: string, namespace: string): string {
  return path.join(storePath, PREFS_DIR, `${namespace}.json`);
}

export function preferencesLockPath(storePath: string, namespace: string): string {
  return path.join(storePath, PREFS_DIR, `.${namespace}.lock`);
}
