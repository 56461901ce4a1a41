export const TABLE_NAMES = [
  'aircraft',
  'flight',
  'imagepic',
  'limitrules',
  'myquery',
  'myquerybuild',
  'pilot',
  'qualification',
  'settingconfig',
  'airfield',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export function isTableName(value: string): value is TableName {
  return (TABLE_NAMES as readonly string[]).includes(value);
}

/** Envelope fields every backup record carries next to its `meta` payload. */
export interface RecordEnvelope {
  table: string;
  guid: unknown;
  user_id: number;
  platform: number;
  _modified: number;
  meta: Record<string, unknown>;
}

export type ImportOutcome =
  | {
      status: 'created' | 'updated';
      table: TableName;
      key: string;
      label: string;
      linked?: string; // guid of a Flight re-bound to this record
    }
  | {
      status: 'skipped';
      table: TableName;
      key: string;
      reason: string;
    };

export type RecordWritten = Extract<ImportOutcome, { status: 'created' | 'updated' }>;

export type DispatchResult =
  | ImportOutcome
  | { status: 'unknown'; table: string; key: string }
  | { status: 'failed'; table: TableName; key: string; reason: string };

export interface ImportSummary {
  total: number;
  created: number;
  updated: number;
  skipped: number;
  unknown: number;
  failed: number;
  linked: number;
}

export function emptySummary(): ImportSummary {
  return {
    total: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    unknown: 0,
    failed: 0,
    linked: 0,
  };
}

/** Best-effort printable key of a raw record, for diagnostics. */
export function describeKey(record: unknown): string {
  if (typeof record === 'object' && record !== null && 'guid' in record) {
    const { guid } = record;
    if (typeof guid === 'string' || typeof guid === 'number') {
      return String(guid);
    }
  }
  return '<none>';
}
