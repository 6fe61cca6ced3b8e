/** Widest field that still decodes exactly into a JS number. */
export const MAX_NUMBER_FIELD_BYTES = 6;

function assertNumberWidth(bytes: Uint8Array): void {
  if (bytes.length > MAX_NUMBER_FIELD_BYTES) {
    throw new RangeError(
      `Cannot decode ${bytes.length} bytes into a number; use the bigint variant`,
    );
  }
}

/** Unsigned little-endian field of at most 6 bytes; see `readLittleEndianBig` for wider ones. */
export function readLittleEndian(bytes: Uint8Array): number {
  assertNumberWidth(bytes);
  let value = 0;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = value * 0x100 + bytes[i];
  }
  return value;
}

/** Unsigned big-endian field of at most 6 bytes; see `readBigEndianBig` for wider ones. */
export function readBigEndian(bytes: Uint8Array): number {
  assertNumberWidth(bytes);
  let value = 0;
  for (let i = 0; i < bytes.length; i++) {
    value = value * 0x100 + bytes[i];
  }
  return value;
}

export function readLittleEndianBig(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

export function readBigEndianBig(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = 0; i < bytes.length; i++) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

/**
 * Round `value` up to the next multiple of `alignment`.
 * Uses the remainder rather than `Math.ceil(value / alignment)` so large offsets stay exact.
 */
export function roundUp(value: number, alignment: number): number {
  if (!Number.isSafeInteger(alignment) || alignment <= 0) {
    throw new RangeError(`Alignment must be a positive integer: ${alignment}`);
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Value must be a non-negative integer: ${value}`);
  }
  const remainder = value % alignment;
  if (remainder === 0) return value;
  const padding = alignment - remainder;
  if (value > Number.MAX_SAFE_INTEGER - padding) {
    throw new RangeError(`Cannot round ${value} up to a multiple of ${alignment} exactly`);
  }
  return value + padding;
}
