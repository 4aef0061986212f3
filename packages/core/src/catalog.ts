export const CASHIERS = ['Adanu', 'Ejigayehu', 'Emush', 'Misrak', 'Tigist', 'Yemisrach'] as const;

export const BANKS = [
  'Abay',
  'Amhara',
  'Awash',
  'Bank of Abyssinia',
  'Bunna',
  'CBE',
  'Dashen',
  'Enat',
  'Hibret',
  'Lion',
  'Nib',
  'Telebirr',
  'Wegagen',
  'Zemen',
] as const;

export type Cashier = (typeof CASHIERS)[number];
export type KnownBank = (typeof BANKS)[number];

export function isCashier(value: string): value is Cashier {
  return (CASHIERS as readonly string[]).includes(value);
}

export function isKnownBank(value: string): value is KnownBank {
  return (BANKS as readonly string[]).includes(value);
}

export function unknownCashierMessage(value: string): string {
  return `Unknown cashier "${value}". Expected one of: ${CASHIERS.join(', ')}`;
}
