export type NumeralFamily = 'DEC' | 'BIN' | 'OCT' | 'HEX' | 'POINTFLOAT' | 'EXPONENTFLOAT';

export const NUMERAL_FAMILIES: readonly NumeralFamily[] = [
  'DEC', 'BIN', 'OCT', 'HEX', 'POINTFLOAT', 'EXPONENTFLOAT',
];

// Reserved message code per family, so output can be filtered by family
export const FAMILY_CODES: Record<NumeralFamily, string> = {
  DEC: 'NSP001',
  BIN: 'NSP011',
  OCT: 'NSP021',
  HEX: 'NSP031',
  POINTFLOAT: 'NSP041',
  EXPONENTFLOAT: 'NSP051',
};

// Prefix checks come first: 0x1e10 is hexadecimal, not an exponent float
export function classifyLiteral(text: string): NumeralFamily {
  const prefix = text.slice(0, 2).toLowerCase();
  if (prefix === '0b') return 'BIN';
  if (prefix === '0o') return 'OCT';
  if (prefix === '0x') return 'HEX';
  if (text.toLowerCase().includes('e')) return 'EXPONENTFLOAT';
  if (text.includes('.')) return 'POINTFLOAT';
  return 'DEC';
}
