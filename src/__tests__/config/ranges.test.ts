import { describe, expect, it } from 'vitest';
import { parseChatId, parseRange, parseRanges, parseRecipient } from '../../config/ranges.js';

describe('parseRecipient', () => {
  it('strips the @ from handles', () => {
    expect(parseRecipient('@alice')).toBe('alice');
  });

  it('turns numeric ids into numbers', () => {
    expect(parseRecipient(' 12345 ')).toBe(12345);
    expect(parseRecipient('-100777')).toBe(-100777);
  });

  it('keeps bare names as handles and drops empties', () => {
    expect(parseRecipient('bob')).toBe('bob');
    expect(parseRecipient('  ')).toBeNull();
    expect(parseRecipient('@')).toBeNull();
  });
});

describe('parseRange', () => {
  it('parses a full entry', () => {
    expect(parseRange('10-50: 100 x 2: @alice, 12345')).toEqual({
      minPrice: 10,
      maxPrice: 50,
      supplyLimit: 100,
      quantity: 2,
      recipients: ['alice', 12345],
    });
  });

  it('accepts compact spacing and an upper-case X', () => {
    expect(parseRange('1-5:10X1:@a')).toEqual({
      minPrice: 1,
      maxPrice: 5,
      supplyLimit: 10,
      quantity: 1,
      recipients: ['a'],
    });
  });

  it('reports malformed entries', () => {
    expect(parseRange('cheap: lots')).toBe('Invalid gift range format: "cheap: lots"');
    expect(parseRange('50-10: 100 x 1: @a')).toBe('Gift range "50-10: 100 x 1: @a" has min price above max price');
    expect(parseRange('10-50: 100 x 0: @a')).toBe('Gift range "10-50: 100 x 0: @a" must buy at least one unit');
    expect(parseRange('10-50: 100 x 1: ,')).toBe('Gift range "10-50: 100 x 1: ," has no recipients');
  });
});

describe('parseRanges', () => {
  it('keeps declared order and skips blank entries', () => {
    const { ranges, errors } = parseRanges('51-100: 50 x 1: @b; ; 10-50: 100 x 2: @a;');
    expect(errors).toEqual([]);
    expect(ranges.map((r) => r.minPrice)).toEqual([51, 10]);
  });

  it('collects every error', () => {
    const { ranges, errors } = parseRanges('bad; 10-50: 100 x 2: @a; worse');
    expect(ranges).toHaveLength(1);
    expect(errors).toEqual(['Invalid gift range format: "bad"', 'Invalid gift range format: "worse"']);
  });
});

describe('parseChatId', () => {
  it('disables notifications for empty values and the bare prefix', () => {
    expect(parseChatId(undefined)).toBeNull();
    expect(parseChatId('')).toBeNull();
    expect(parseChatId('-100')).toBeNull();
    expect(parseChatId('0')).toBeNull();
  });

  it('parses numeric chats and handles', () => {
    expect(parseChatId('-1001234567890')).toBe(-1001234567890);
    expect(parseChatId('@ops_channel')).toBe('@ops_channel');
    expect(parseChatId('ops_channel')).toBe('@ops_channel');
  });
});
