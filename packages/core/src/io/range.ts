export function assertRange(position: number, length: number): void {
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new RangeError(`Invalid read position: ${position}`);
  }
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`Invalid read length: ${length}`);
  }
}
