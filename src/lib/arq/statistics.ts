/**
 * Counters consumed by reporting code. The protocol logic only ever
 * increments them; nothing in the core reads them back.
 */
export interface TransportStatistics {
  framesSent: number;
  framesResent: number;
  acksSent: number;
  acksReceived: number;
  newAcks: number;
  duplicateAcks: number;
  corruptedAcks: number;
  framesReceived: number;
  framesDelivered: number;
  duplicateFrames: number;
  corruptedFrames: number;
  outOfWindowFrames: number;
  windowFull: number;
}

export function createStatistics(): TransportStatistics {
  return {
    framesSent: 0,
    framesResent: 0,
    acksSent: 0,
    acksReceived: 0,
    newAcks: 0,
    duplicateAcks: 0,
    corruptedAcks: 0,
    framesReceived: 0,
    framesDelivered: 0,
    duplicateFrames: 0,
    corruptedFrames: 0,
    outOfWindowFrames: 0,
    windowFull: 0,
  };
}
