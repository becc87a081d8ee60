import { z } from 'zod';
import type { AuxiliaryKind, AuxiliaryValue } from '../types/index.js';

export const ETH_ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

export const ethAddressSchema = z
  .string()
  .regex(ETH_ADDRESS_REGEX, 'Must match 0x followed by 40 hex characters');

export function isEthAddress(value: string): boolean {
  return ETH_ADDRESS_REGEX.test(value);
}

/** Classify a value read from the auxiliary slot. No trimming is applied. */
export function classify(value: string): AuxiliaryKind {
  if (isEthAddress(value)) return 'wallet-address';
  // Anything dotted, e.g. "vitalik.eth"
  if (value.includes('.')) return 'ens-name';
  return 'neither';
}

export function toAuxiliaryValue(raw: string | null | undefined): AuxiliaryValue {
  if (raw === null || raw === undefined) return { kind: 'absent' };
  switch (classify(raw)) {
    case 'wallet-address':
      return { kind: 'wallet-address', value: raw };
    case 'ens-name':
      return { kind: 'ens-name', value: raw };
    case 'neither':
      return { kind: 'unclassified', value: raw };
  }
}

/** Split an auxiliary value into the contact fields it contributes. */
export function auxiliaryFields(aux: AuxiliaryValue): { ethAddress?: string; ensName?: string } {
  switch (aux.kind) {
    case 'wallet-address':
      return { ethAddress: aux.value };
    case 'ens-name':
      return { ensName: aux.value };
    case 'unclassified':
    case 'absent':
      return {};
  }
}
