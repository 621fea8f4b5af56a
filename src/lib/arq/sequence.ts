/**
 * Wraparound-safe arithmetic over a sequence space of `modulus` numbers.
 * Sequence numbers are never compared with `<` or `>` directly.
 */

export function modularDistance(to: number, from: number, modulus: number): number {
  return (((to - from) % modulus) + modulus) % modulus;
}

export function inWindow(
  seq: number,
  windowStart: number,
  windowSize: number,
  modulus: number
): boolean {
  return modularDistance(seq, windowStart, modulus) < windowSize;
}

export function nextSequence(seq: number, modulus: number): number {
  return (seq + 1) % modulus;
}

export function previousSequence(seq: number, modulus: number): number {
  return (seq - 1 + modulus) % modulus;
}

export function isSequenceNumber(seq: number, modulus: number): boolean {
  return Number.isInteger(seq) && seq >= 0 && seq < modulus;
}
