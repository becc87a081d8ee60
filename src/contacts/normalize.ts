import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

/** Normalize a phone number to E.164 format. Returns the stripped input if parsing fails. */
export function normalizePhone(raw: string, defaultCountry: CountryCode = 'US'): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  // Fallback: strip formatting characters
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw;
}

/** Lowercased wallet address, for comparisons only; stored values keep their case. */
export function normalizeEthAddress(address: string): string {
  return address.trim().toLowerCase();
}
