// Conversions between SQLite column values and record fields.

export function nowIso(): string {
  return new Date().toISOString();
}

export function toDate(value: string): Date;
export function toDate(value: string | null): Date | null;
export function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function fromDate(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}

export function isExpired(expires: Date | null, at: Date = new Date()): boolean {
  return expires !== null && expires.getTime() <= at.getTime();
}
