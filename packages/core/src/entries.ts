import { z } from 'zod';

export const HEADERS = ['ID', 'Timestamp', 'Cashier', 'Bank', 'Credit'] as const;

export type Header = (typeof HEADERS)[number];

export type RawRow = Record<Header, string>;

export type RowValues = [id: string, timestamp: string, cashier: string, bank: string, credit: string];

export interface LedgerEntry {
  id: number;
  timestamp: string;
  cashier: string;
  bank: string;
  credit: number;
}

export interface RowDefect {
  column: Header;
  message: string;
}

export interface RejectedRow {
  /** Sheet-style row number; the header occupies row 1. */
  position: number;
  raw: RawRow;
  defects: RowDefect[];
}

export interface LedgerSnapshot {
  entries: LedgerEntry[];
  rejected: RejectedRow[];
}

export type ParsedRow =
  | { ok: true; entry: LedgerEntry }
  | { ok: false; defects: RowDefect[] };

const requiredText = z.string().trim().min(1, 'must not be empty');

const rowSchema = z.object({
  ID: z.string().transform((value, ctx) => {
    const trimmed = value.trim();
    if (!/^0*[1-9]\d*$/.test(trimmed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a positive integer' });
      return z.NEVER;
    }
    const numeric = Number(trimmed);
    if (!Number.isSafeInteger(numeric)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must not exceed ${Number.MAX_SAFE_INTEGER}` });
      return z.NEVER;
    }
    return numeric;
  }),
  Timestamp: requiredText,
  Cashier: requiredText,
  Bank: requiredText,
  Credit: z.string().transform((value, ctx) => {
    const cleaned = value.trim().replace(/,/g, '');
    const numeric = Number(cleaned);
    if (cleaned === '' || !Number.isFinite(numeric)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a number' });
      return z.NEVER;
    }
    if (numeric <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be greater than zero' });
      return z.NEVER;
    }
    return numeric;
  }),
});

export function parseRow(raw: RawRow): ParsedRow {
  const parsed = rowSchema.safeParse(raw);
  if (!parsed.success) {
    const defects = parsed.error.issues.map((issue) => ({
      column: toHeader(issue.path[0]),
      message: issue.message,
    }));
    return { ok: false, defects };
  }

  const row = parsed.data;
  return {
    ok: true,
    entry: {
      id: row.ID,
      timestamp: row.Timestamp,
      cashier: row.Cashier,
      bank: row.Bank,
      credit: row.Credit,
    },
  };
}

export function parseRows(rows: RawRow[]): LedgerSnapshot {
  const entries: LedgerEntry[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((raw, index) => {
    const result = parseRow(raw);
    if (result.ok) {
      entries.push(result.entry);
    } else {
      rejected.push({ position: index + 2, raw, defects: result.defects });
    }
  });

  return { entries, rejected };
}

export function toRowValues(entry: LedgerEntry): RowValues {
  return [String(entry.id), entry.timestamp, entry.cashier, entry.bank, String(entry.credit)];
}

export function rowFromValues(values: readonly string[]): RawRow {
  return {
    ID: values[0] ?? '',
    Timestamp: values[1] ?? '',
    Cashier: values[2] ?? '',
    Bank: values[3] ?? '',
    Credit: values[4] ?? '',
  };
}

/**
 * Next identifier for a snapshot: one past the largest numeric id, or 1 when
 * there is none. Only plain decimal ids count; fractions are truncated.
 *
 * @throws RangeError when the next id would leave the safe integer range
 */
export function nextId(rows: ReadonlyArray<{ id: number | string }>): number {
  let max: bigint | null = null;

  for (const row of rows) {
    const value = integerPart(row.id);
    if (value === null) {
      continue;
    }
    if (max === null || value > max) {
      max = value;
    }
  }

  if (max === null || max < 1n) {
    return 1;
  }

  const next = max + 1n;
  if (next > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`Next entry ID ${next} exceeds ${Number.MAX_SAFE_INTEGER}`);
  }
  return Number(next);
}

/** Every id in a snapshot, including those of rows that failed to parse. */
export function snapshotIds(snapshot: LedgerSnapshot): Array<{ id: number | string }> {
  return [
    ...snapshot.entries.map((entry) => ({ id: entry.id })),
    ...snapshot.rejected.map((row) => ({ id: row.raw.ID })),
  ];
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

const DECIMAL_ID = /^([+-]?\d+)(?:\.\d+)?$/;

function integerPart(id: number | string): bigint | null {
  if (typeof id === 'number') {
    return Number.isFinite(id) ? BigInt(Math.trunc(id)) : null;
  }
  const match = DECIMAL_ID.exec(id.trim());
  if (!match?.[1]) {
    return null;
  }
  return BigInt(match[1].replace(/^\+/, ''));
}

function toHeader(segment: unknown): Header {
  const match = HEADERS.find((header) => header === segment);
  return match ?? 'ID';
}
