export type Row = Record<string, unknown>;

function columnError(column: string, expected: string): Error {
  return new Error(`Column ${column}: expected ${expected}`);
}

export function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw columnError(column, 'text');
  return value;
}

export function textOrNull(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : text(row, column);
}

export function int(row: Row, column: string): number {
  const value = Number(row[column]);
  if (!Number.isInteger(value)) throw columnError(column, 'integer');
  return value;
}

export function bool(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') throw columnError(column, 'boolean');
  return value;
}

export function timestamp(row: Row, column: string): Date {
  const value = row[column];
  if (!(value instanceof Date)) throw columnError(column, 'timestamp');
  return value;
}

export function timestampOrNull(row: Row, column: string): Date | null {
  const value = row[column];
  return value === null || value === undefined ? null : timestamp(row, column);
}

export function textArray(row: Row, column: string): string[] {
  const value = row[column];
  if (!Array.isArray(value)) throw columnError(column, 'text[]');
  return value.map((item) => {
    if (typeof item !== 'string') throw columnError(column, 'text[]');
    return item;
  });
}

export function oneOf<T extends string>(row: Row, column: string, allowed: readonly T[]): T {
  const value = row[column];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw columnError(column, allowed.join(' | '));
  return match;
}

export function oneOfOrNull<T extends string>(row: Row, column: string, allowed: readonly T[]): T | null {
  const value = row[column];
  return value === null || value === undefined ? null : oneOf(row, column, allowed);
}

export function json(row: Row, column: string): Row {
  const value = row[column];
  if (value === null || typeof value !== 'object' || Array.isArray(value)) throw columnError(column, 'json object');
  return Object.fromEntries(Object.entries(value));
}
