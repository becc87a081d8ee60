export class ContactNotFoundError extends Error {
  constructor(id: string) {
    super(`Contact not found: ${id}`);
    this.name = 'ContactNotFoundError';
  }
}

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

/** Read or write access to a contact store was refused. */
export class PermissionDeniedError extends StoreError {
  constructor(store: string, access: 'read' | 'write') {
    super(`[${store}] ${access} access denied`);
    this.name = 'PermissionDeniedError';
  }
}

/** Bad input from the caller, raised before any store is touched. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidEthAddressError extends InvalidArgumentError {
  constructor(address: string) {
    super(`Invalid ETH address "${address}": must match 0x followed by 40 hex characters`);
    this.name = 'InvalidEthAddressError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node.js system error such as ENOENT, if there is one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
