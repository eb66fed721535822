export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function normalizeInstrumentId(raw: string): string {
  return raw.trim().toUpperCase();
}

export function finiteOrNull(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return null;
  }
  return value;
}

export function pass(text: string): string {
  return `✓ ${text}`;
}

export function borderline(text: string): string {
  return `~ ${text}`;
}

export function fail(text: string): string {
  return `✗ ${text}`;
}
