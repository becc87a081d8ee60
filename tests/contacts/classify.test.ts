import { describe, it, expect } from 'vitest';
import { auxiliaryFields, classify, ethAddressSchema, toAuxiliaryValue } from '../../src/contacts/classify.js';
import { ADDRESS_A } from '../helpers.js';

describe('classify', () => {
  it('should classify 0x plus 40 hex characters as a wallet address', () => {
    expect(classify('0x' + 'a'.repeat(40))).toBe('wallet-address');
    expect(classify(ADDRESS_A)).toBe('wallet-address');
    expect(classify('0x' + 'F'.repeat(40))).toBe('wallet-address');
  });

  it('should classify dotted values as ENS names', () => {
    expect(classify('vitalik.eth')).toBe('ens-name');
    expect(classify('sub.domain.eth')).toBe('ens-name');
    expect(classify('.')).toBe('ens-name');
  });

  it('should classify a dotted near-address as an ENS name', () => {
    expect(classify('0x' + 'a'.repeat(39) + '.')).toBe('ens-name');
  });

  it('should classify everything else as neither', () => {
    expect(classify('')).toBe('neither');
    expect(classify('not-an-address')).toBe('neither');
    expect(classify('0x123')).toBe('neither');
    expect(classify('0x' + 'a'.repeat(41))).toBe('neither');
    expect(classify('0x' + 'g'.repeat(40))).toBe('neither');
  });

  it('should require a lowercase 0x prefix', () => {
    expect(classify('0X' + 'a'.repeat(40))).toBe('neither');
  });

  it('should not trim surrounding whitespace', () => {
    expect(classify(` ${ADDRESS_A}`)).toBe('neither');
    expect(classify(`${ADDRESS_A}\n`)).toBe('neither');
  });

  it('should map every input to exactly one kind', () => {
    const inputs = ['', ' ', 'alice', 'alice.eth', ADDRESS_A, '0x', '0x.', 'ÿ.ÿ', '0x' + '0'.repeat(40)];
    for (const input of inputs) {
      expect(['wallet-address', 'ens-name', 'neither']).toContain(classify(input));
    }
  });
});

describe('toAuxiliaryValue', () => {
  it('should tag a missing value as absent', () => {
    expect(toAuxiliaryValue(undefined)).toEqual({ kind: 'absent' });
    expect(toAuxiliaryValue(null)).toEqual({ kind: 'absent' });
  });

  it('should keep the raw value for each classification', () => {
    expect(toAuxiliaryValue(ADDRESS_A)).toEqual({ kind: 'wallet-address', value: ADDRESS_A });
    expect(toAuxiliaryValue('bob.eth')).toEqual({ kind: 'ens-name', value: 'bob.eth' });
    expect(toAuxiliaryValue('bob')).toEqual({ kind: 'unclassified', value: 'bob' });
  });
});

describe('auxiliaryFields', () => {
  it('should contribute at most one Ethereum field', () => {
    expect(auxiliaryFields({ kind: 'wallet-address', value: ADDRESS_A })).toEqual({ ethAddress: ADDRESS_A });
    expect(auxiliaryFields({ kind: 'ens-name', value: 'bob.eth' })).toEqual({ ensName: 'bob.eth' });
    expect(auxiliaryFields({ kind: 'unclassified', value: 'bob' })).toEqual({});
    expect(auxiliaryFields({ kind: 'absent' })).toEqual({});
  });
});

describe('ethAddressSchema', () => {
  it('should accept wallet addresses and reject anything else', () => {
    expect(ethAddressSchema.safeParse(ADDRESS_A).success).toBe(true);
    expect(ethAddressSchema.safeParse('vitalik.eth').success).toBe(false);
  });
});
