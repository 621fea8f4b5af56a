import CRC32 from "crc-32";
import type { ChecksumAlgorithm, Frame, FrameFields } from "./types";

export interface IntegrityChecker {
  readonly algorithm: ChecksumAlgorithm;
  compute(frame: FrameFields): number;
  isCorrupted(frame: Frame): boolean;
}

/**
 * Additive checksum: seqnum + acknum + sum of payload bytes.
 * The frame's own checksum field is never part of the sum.
 */
export function computeChecksum(frame: FrameFields | Frame): number {
  let checksum = frame.seqnum + frame.acknum;
  for (const byte of frame.payload) {
    checksum += byte;
  }
  return checksum;
}

export function isCorrupted(frame: Frame): boolean {
  return frame.checksum !== computeChecksum(frame);
}

export function computeCrc32Checksum(frame: FrameFields): number {
  const header = new ArrayBuffer(8);
  const view = new DataView(header);
  view.setInt32(0, frame.seqnum, true);
  view.setInt32(4, frame.acknum, true);

  const seed = CRC32.buf(new Uint8Array(header));
  return CRC32.buf(frame.payload, seed);
}

export const additiveChecker: IntegrityChecker = {
  algorithm: "additive",
  compute: computeChecksum,
  isCorrupted,
};

export const crc32Checker: IntegrityChecker = {
  algorithm: "crc32",
  compute: computeCrc32Checksum,
  isCorrupted: (frame) => frame.checksum !== computeCrc32Checksum(frame),
};

export function createIntegrityChecker(
  algorithm: ChecksumAlgorithm
): IntegrityChecker {
  switch (algorithm) {
    case "additive":
      return additiveChecker;
    case "crc32":
      return crc32Checker;
  }
}
