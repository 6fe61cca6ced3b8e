import { describe, expect, it } from 'vitest';
import {
  readBigEndian,
  readBigEndianBig,
  readLittleEndian,
  readLittleEndianBig,
  roundUp,
} from '../src/byte-codec.js';

describe('readLittleEndian', () => {
  it('reads a u32 field', () => {
    expect(readLittleEndian(new Uint8Array([0x00, 0x20, 0x00, 0x00]))).toBe(0x2000);
  });

  it('reads the top bit without going negative', () => {
    expect(readLittleEndian(new Uint8Array([0xff, 0xff, 0xff, 0xff]))).toBe(0xffffffff);
  });

  it('returns 0 for an empty slice', () => {
    expect(readLittleEndian(new Uint8Array(0))).toBe(0);
  });

  it('rejects fields wider than 6 bytes', () => {
    expect(() => readLittleEndian(new Uint8Array(7))).toThrow(RangeError);
  });
});

describe('readBigEndian', () => {
  it('reads a single byte', () => {
    expect(readBigEndian(new Uint8Array([0x80]))).toBe(0x80);
  });

  it('reads most significant byte first', () => {
    expect(readBigEndian(new Uint8Array([0x12, 0x34, 0x56]))).toBe(0x123456);
  });

  it('equals little-endian decoding of the reversed bytes', () => {
    const samples = [
      [0x01],
      [0x01, 0x02],
      [0xff, 0x00, 0x7f],
      [0x12, 0x34, 0x56, 0x78],
      [0xfe, 0xdc, 0xba, 0x98, 0x76, 0x54],
    ];
    for (const sample of samples) {
      const bytes = new Uint8Array(sample);
      const reversed = new Uint8Array([...sample].reverse());
      expect(readBigEndian(bytes)).toBe(readLittleEndian(reversed));
    }
  });
});

describe('bigint variants', () => {
  it('decodes 8-byte fields exactly', () => {
    const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x88]);
    expect(readLittleEndianBig(bytes)).toBe(0x8807060504030201n);
    expect(readBigEndianBig(bytes)).toBe(0x0102030405060788n);
  });

  it('agrees with the number variants for short fields', () => {
    const bytes = new Uint8Array([0x34, 0x12]);
    expect(readLittleEndianBig(bytes)).toBe(BigInt(readLittleEndian(bytes)));
    expect(readBigEndianBig(bytes)).toBe(BigInt(readBigEndian(bytes)));
  });
});

describe('roundUp', () => {
  it('keeps values already aligned', () => {
    expect(roundUp(0x200, 0x200)).toBe(0x200);
    expect(roundUp(0, 0x10)).toBe(0);
  });

  it('rounds to the next multiple', () => {
    expect(roundUp(0x201, 0x200)).toBe(0x400);
    expect(roundUp(1, 4)).toBe(4);
  });

  it('stays exact for offsets near the safe-integer limit', () => {
    const alignment = 0x1000;
    const value = Number.MAX_SAFE_INTEGER - 0x2000;
    const result = roundUp(value, alignment);
    expect(result % alignment).toBe(0);
    expect(result).toBeGreaterThanOrEqual(value);
    expect(result - value).toBeLessThan(alignment);
  });

  it('satisfies the alignment bounds for a range of inputs', () => {
    for (const alignment of [1, 2, 3, 16, 0x200, 0x8000]) {
      for (const value of [0, 1, 15, 16, 17, 511, 512, 513, 99999]) {
        const result = roundUp(value, alignment);
        expect(result).toBeGreaterThanOrEqual(value);
        expect(result % alignment).toBe(0);
        expect(result).toBeLessThan(value + alignment);
      }
    }
  });

  it('rejects non-positive alignments', () => {
    expect(() => roundUp(10, 0)).toThrow(RangeError);
    expect(() => roundUp(10, -4)).toThrow(RangeError);
  });

  it('rejects a result past the safe-integer limit', () => {
    expect(() => roundUp(Number.MAX_SAFE_INTEGER, 3)).toThrow(RangeError);
    expect(() => roundUp(Number.MAX_SAFE_INTEGER - 1, 0x1000)).toThrow(RangeError);
    expect(roundUp(Number.MAX_SAFE_INTEGER - 1, 2)).toBe(Number.MAX_SAFE_INTEGER - 1);
  });

  it('rejects negative or fractional values', () => {
    expect(() => roundUp(-1, 4)).toThrow(RangeError);
    expect(() => roundUp(1.5, 4)).toThrow(RangeError);
  });
});
