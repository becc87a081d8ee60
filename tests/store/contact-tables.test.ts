import { describe, it, expect, beforeEach } from 'vitest';
import { ContactTables, emptySnapshot } from '../../src/store/contact-tables.js';
import { PermissionDeniedError } from '../../src/utils/errors.js';
import { CONTACT_MIME_TYPES } from '../../src/types/index.js';
import { ADDRESS_A, seedContact } from '../helpers.js';

let tables: ContactTables;

beforeEach(() => {
  tables = new ContactTables();
});

describe('ContactTables', () => {
  describe('createContact', () => {
    it('should assign sequential ids', async () => {
      expect(await tables.createContact('A')).toBe('1');
      expect(await tables.createContact('B')).toBe('2');
    });

    it('should write name, phone and email rows', async () => {
      await tables.createContact('Ann', '+15550001111', 'ann@example.com');

      expect(await tables.listDataRows(CONTACT_MIME_TYPES)).toEqual([
        { contactId: '1', mimeType: 'structured-name', primaryValue: 'Ann' },
        { contactId: '1', mimeType: 'phone', primaryValue: '+15550001111' },
        { contactId: '1', mimeType: 'email', primaryValue: 'ann@example.com' },
      ]);
    });

    it('should store the normalized phone number beside the raw one', async () => {
      await tables.createContact('Ann', '(555) 123-4567');

      const phoneRow = tables.toSnapshot().data.find(row => row.mimeType === 'phone');
      expect(phoneRow?.data1).toBe('(555) 123-4567');
      expect(phoneRow?.normalizedNumber).toBe('+15551234567');
    });

    it('should normalize with the configured default country', async () => {
      const gb = new ContactTables({ defaultCountry: 'GB' });
      await gb.createContact('Ann', '020 7946 0958');

      expect(gb.toSnapshot().data[1].normalizedNumber).toBe('+442079460958');
    });

    it('should reject the whole batch without write permission', async () => {
      tables.setPermissions({ write: false });

      await expect(tables.createContact('Ann', '+15550001111')).rejects.toThrow(PermissionDeniedError);
      expect(tables.toSnapshot()).toEqual(emptySnapshot());
    });
  });

  describe('listDataRows', () => {
    it('should order rows by contact id', async () => {
      const first = tables.insertContact();
      const second = tables.insertContact();
      tables.insertRow(second, { mimeType: 'phone', data1: '222' });
      tables.insertRow(first, { mimeType: 'phone', data1: '111' });

      const rows = await tables.listDataRows(['phone']);
      expect(rows.map(r => r.primaryValue)).toEqual(['111', '222']);
    });

    it('should order contact ids numerically', async () => {
      for (let i = 0; i < 10; i++) seedContact(tables, { name: `C${i + 1}` });

      const rows = await tables.listDataRows(['structured-name']);
      expect(rows.map(r => r.contactId)).toEqual(['1', '2', '3', '4', '5', '6', '7', '8', '9', '10']);
    });

    it('should return only the requested MIME types', async () => {
      seedContact(tables, { name: 'Ann', phone: '111', email: 'ann@example.com' });

      const rows = await tables.listDataRows(['email']);
      expect(rows).toEqual([{ contactId: '1', mimeType: 'email', primaryValue: 'ann@example.com' }]);
    });

    it('should expose the auxiliary column only on name rows', async () => {
      const id = seedContact(tables, { name: 'Ann', aux: ADDRESS_A });
      tables.insertRow(id, { mimeType: 'phone', data1: '111', data15: 'stray' });

      const rows = await tables.listDataRows(CONTACT_MIME_TYPES);
      expect(rows[0].auxiliaryValue).toBe(ADDRESS_A);
      expect(rows[1]).not.toHaveProperty('auxiliaryValue');
    });

    it('should throw without read permission', async () => {
      tables.setPermissions({ read: false });

      await expect(tables.listDataRows(CONTACT_MIME_TYPES)).rejects.toThrow('[memory] read access denied');
    });
  });

  describe('getContactHeader', () => {
    it('should return the name and first photo', async () => {
      const id = seedContact(tables, { name: 'Ann', photoUri: 'content://photos/1' });
      tables.insertRow(id, { mimeType: 'photo', photoUri: 'content://photos/2' });

      expect(await tables.getContactHeader(id)).toEqual({ displayName: 'Ann', photoUri: 'content://photos/1' });
    });

    it('should return an empty name for contacts without a name row', async () => {
      const id = seedContact(tables, { phone: '111' });

      expect(await tables.getContactHeader(id)).toEqual({ displayName: '' });
    });

    it('should return null for unknown ids', async () => {
      expect(await tables.getContactHeader('7')).toBeNull();
      expect(await tables.getContactHeader('-1')).toBeNull();
    });

    it('should only accept ids in canonical form', async () => {
      seedContact(tables, { name: 'Amy', aux: 'amy.eth', phone: '111' });

      expect(await tables.getContactHeader('01')).toBeNull();
      expect(await tables.getContactHeader('+1')).toBeNull();
      expect(await tables.queryField('01', 'phone')).toBeUndefined();
      expect(await tables.setAuxiliaryField('01', 'x.eth')).toBe(false);
      expect(await tables.getAuxiliaryField('1')).toBe('amy.eth');
    });
  });

  describe('queryField', () => {
    it('should return the first row of the requested kind', async () => {
      const id = seedContact(tables, { name: 'Ann', phone: '111', email: 'a@example.com' });
      tables.insertRow(id, { mimeType: 'phone', data1: '222' });

      expect(await tables.queryField(id, 'phone')).toBe('111');
      expect(await tables.queryField(id, 'email')).toBe('a@example.com');
    });

    it('should return undefined when there is no such row', async () => {
      const id = seedContact(tables, { name: 'Ann' });

      expect(await tables.queryField(id, 'phone')).toBeUndefined();
    });
  });

  describe('setAuxiliaryField', () => {
    it('should update the first name row', async () => {
      const id = seedContact(tables, { name: 'Ann' });

      expect(await tables.setAuxiliaryField(id, 'ann.eth')).toBe(true);
      expect(await tables.getAuxiliaryField(id)).toBe('ann.eth');
    });

    it('should return false without a name row', async () => {
      const id = seedContact(tables, { email: 'a@example.com' });

      expect(await tables.setAuxiliaryField(id, 'ann.eth')).toBe(false);
      expect(await tables.setAuxiliaryField('99', 'ann.eth')).toBe(false);
    });

    it('should throw without write permission', async () => {
      const id = seedContact(tables, { name: 'Ann' });
      tables.setPermissions({ write: false });

      await expect(tables.setAuxiliaryField(id, 'ann.eth')).rejects.toThrow(PermissionDeniedError);
    });
  });

  describe('snapshots', () => {
    it('should not share state with the snapshot it was built from', async () => {
      const snapshot = emptySnapshot();
      const fromSnapshot = new ContactTables({ snapshot });
      await fromSnapshot.createContact('Ann');

      expect(snapshot).toEqual(emptySnapshot());
      expect(fromSnapshot.toSnapshot().contacts).toEqual([{ id: 1 }]);
    });

    it('should refuse rows for unknown contacts', () => {
      expect(() => tables.insertRow('5', { mimeType: 'phone', data1: '1' })).toThrow('No contact record for id 5');
    });
  });
});
