import type { AcquisitionRange, Recipient } from '../services/acquisition/types.js';

export interface ParsedRanges {
  ranges: AcquisitionRange[];
  errors: string[];
}

const RANGE_PATTERN = /^(\d+)\s*-\s*(\d+)\s*:\s*(\d+)\s*x\s*(\d+)\s*:\s*(.+)$/i;

/**
 * `@name` → 'name', digits (optionally negative) → number, anything else is
 * kept as a handle.
 */
export function parseRecipient(value: string): Recipient | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (trimmed.startsWith('@')) return trimmed.slice(1) || null;
  if (/^-?\d+$/.test(trimmed)) return Number(trimmed);
  return trimmed;
}

export function parseRecipients(value: string): Recipient[] {
  return value
    .split(',')
    .map(parseRecipient)
    .filter((r): r is Recipient => r !== null);
}

/**
 * Parse one `min-max: supply x quantity: recipient, recipient` entry.
 * Returns a message instead of a range when the entry is malformed.
 */
export function parseRange(entry: string): AcquisitionRange | string {
  const match = RANGE_PATTERN.exec(entry.trim());
  if (!match) return `Invalid gift range format: "${entry.trim()}"`;

  const [, min, max, supply, qty, recipientsPart] = match;
  const range: AcquisitionRange = {
    minPrice: Number(min),
    maxPrice: Number(max),
    supplyLimit: Number(supply),
    quantity: Number(qty),
    recipients: parseRecipients(recipientsPart ?? ''),
  };

  if (range.minPrice > range.maxPrice) return `Gift range "${entry.trim()}" has min price above max price`;
  if (range.quantity < 1) return `Gift range "${entry.trim()}" must buy at least one unit`;
  if (range.recipients.length === 0) return `Gift range "${entry.trim()}" has no recipients`;

  return range;
}

/** Ranges are separated by `;` and keep their declared order. */
export function parseRanges(value: string): ParsedRanges {
  const result: ParsedRanges = { ranges: [], errors: [] };

  for (const entry of value.split(';')) {
    if (!entry.trim()) continue;
    const parsed = parseRange(entry);
    if (typeof parsed === 'string') result.errors.push(parsed);
    else result.ranges.push(parsed);
  }

  return result;
}

/**
 * Notification chat: empty or the bare `-100` prefix disables notifications,
 * `@name` is kept, numeric ids become numbers, other text is treated as a
 * public handle.
 */
export function parseChatId(value: string | undefined): number | string | null {
  const trimmed = value?.trim() ?? '';
  if (!trimmed || trimmed === '-100') return null;
  if (trimmed.startsWith('@')) return trimmed;
  if (/^-?\d+$/.test(trimmed)) return Number(trimmed) || null;
  return `@${trimmed}`;
}
