import type { IntegrityChecker } from "./checksum";
import { ArqValidationError } from "./errors";
import { ACK_FILL_BYTE, NOT_IN_USE, PAYLOAD_SIZE, type Frame } from "./types";

export const SEQNUM_SIZE = 4;
export const ACKNUM_SIZE = 4;
export const CHECKSUM_SIZE = 4;
export const FRAME_HEADER_SIZE = SEQNUM_SIZE + ACKNUM_SIZE + CHECKSUM_SIZE;
export const FRAME_SIZE = FRAME_HEADER_SIZE + PAYLOAD_SIZE;

export function createDataFrame(
  seqnum: number,
  message: Uint8Array,
  checker: IntegrityChecker
): Frame {
  if (message.length !== PAYLOAD_SIZE) {
    throw new ArqValidationError(
      `Message must be exactly ${PAYLOAD_SIZE} bytes, got ${message.length}`
    );
  }

  const fields = {
    seqnum,
    acknum: NOT_IN_USE,
    payload: new Uint8Array(message),
  };
  return { ...fields, checksum: checker.compute(fields) };
}

export function createAckFrame(
  seqnum: number,
  acknum: number,
  checker: IntegrityChecker
): Frame {
  const fields = {
    seqnum,
    acknum,
    payload: new Uint8Array(PAYLOAD_SIZE).fill(ACK_FILL_BYTE),
  };
  return { ...fields, checksum: checker.compute(fields) };
}

export function cloneFrame(frame: Frame): Frame {
  return { ...frame, payload: new Uint8Array(frame.payload) };
}

export function encodeFrame(frame: Frame): ArrayBuffer {
  if (frame.payload.length !== PAYLOAD_SIZE) {
    throw new ArqValidationError(
      `Frame payload must be exactly ${PAYLOAD_SIZE} bytes, got ${frame.payload.length}`
    );
  }

  const data = new ArrayBuffer(FRAME_SIZE);
  const view = new DataView(data);

  let offset = 0;
  view.setInt32(offset, frame.seqnum, true);
  offset += SEQNUM_SIZE;

  view.setInt32(offset, frame.acknum, true);
  offset += ACKNUM_SIZE;

  view.setInt32(offset, frame.checksum, true);
  offset += CHECKSUM_SIZE;

  new Uint8Array(data, offset).set(frame.payload);

  return data;
}

/**
 * Decodes a datagram into a frame. Returns null when the datagram does not
 * have the frame layout; checksum verification is left to the receiver.
 */
export function decodeFrame(data: ArrayBuffer): Frame | null {
  if (data.byteLength !== FRAME_SIZE) {
    return null;
  }

  const view = new DataView(data);
  let offset = 0;

  const seqnum = view.getInt32(offset, true);
  offset += SEQNUM_SIZE;

  const acknum = view.getInt32(offset, true);
  offset += ACKNUM_SIZE;

  const checksum = view.getInt32(offset, true);
  offset += CHECKSUM_SIZE;

  const payload = new Uint8Array(data.slice(offset, offset + PAYLOAD_SIZE));

  return { seqnum, acknum, checksum, payload };
}
