import { PermissionDeniedError, StoreError, describeError, errnoCode } from '../utils/index.js';

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/** Map a filesystem failure onto the store error taxonomy. */
export function toStoreError(store: string, access: 'read' | 'write', err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  const code = errnoCode(err);
  if (code && PERMISSION_CODES.has(code)) {
    return new PermissionDeniedError(store, access);
  }
  return new StoreError(`[${store}] ${access} failed: ${describeError(err)}`);
}
