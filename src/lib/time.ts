export function nowIso(): string {
  return new Date().toISOString();
}

export function toIsoOrNull(value: string | undefined | null): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}
