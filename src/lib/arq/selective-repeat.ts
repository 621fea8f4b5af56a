import { BaseReceiver } from "./receiver";
import { BaseSender } from "./sender";
import {
  inWindow,
  isSequenceNumber,
  nextSequence,
} from "./sequence";
import type { Frame, TimeoutOutcome } from "./types";

/**
 * Selective Repeat sender: every frame is acknowledged individually and
 * a timeout retransmits only the oldest unacknowledged frame.
 */
export class SelectiveRepeatSender extends BaseSender {
  private readonly acked: Set<number> = new Set();

  isAcked(seqnum: number): boolean {
    return this.acked.has(seqnum);
  }

  onFrame(frame: Frame): void {
    const { checker, statistics, logger } = this.context;

    if (checker.isCorrupted(frame)) {
      statistics.corruptedAcks++;
      logger.trace(1, "Corrupted ACK is received, do nothing");
      return;
    }

    statistics.acksReceived++;
    const { acknum } = frame;
    logger.trace(1, `Uncorrupted ACK ${acknum} is received`);

    if (!this.isOutstanding(acknum) || this.acked.has(acknum)) {
      statistics.duplicateAcks++;
      logger.trace(1, `Duplicate ACK ${acknum}, do nothing`);
      return;
    }

    logger.trace(1, `ACK ${acknum} is not a duplicate`);
    statistics.newAcks++;
    this.acked.add(acknum);
    this.retries.set(acknum, 0);

    while (this.inFlight > 0 && this.acked.has(this.base)) {
      this.advanceBase();
    }
    this.restartOrStopTimer();
  }

  onTimeout(): TimeoutOutcome {
    const { config, statistics, logger, timer } = this.context;

    if (this.inFlight === 0) {
      return { kind: "idle" };
    }

    const exhausted = this.checkRetryLimit();
    if (exhausted) {
      return exhausted;
    }

    const seqnum = this.base;
    logger.trace(1, `Timeout, resending frame ${seqnum}`);
    this.transmit(this.frameAt(seqnum));
    statistics.framesResent++;
    this.recordRetransmission(seqnum);
    timer.start(config.retransmissionTimeout);

    return { kind: "retransmitted", seqnums: [seqnum] };
  }

  protected override advanceBase(): void {
    this.acked.delete(this.base);
    super.advanceBase();
  }
}

/**
 * Selective Repeat receiver: buffers any frame inside the receive window,
 * acknowledges exactly the sequence number received and delivers the
 * contiguous run starting at `expected`.
 *
 * Corrupted frames are dropped without an acknowledgment. A frame from the
 * window just below `expected` was already delivered and is re-acknowledged,
 * since only a lost acknowledgment makes the sender resend it.
 */
export class SelectiveRepeatReceiver extends BaseReceiver {
  private readonly buffered: Map<number, Frame> = new Map();
  private readonly received: Set<number> = new Set();

  isBuffered(seqnum: number): boolean {
    return this.received.has(seqnum);
  }

  get bufferedCount(): number {
    return this.received.size;
  }

  onFrame(frame: Frame): void {
    const { checker, config, statistics, logger } = this.context;
    const { windowSize, sequenceSpace } = config;

    if (checker.isCorrupted(frame)) {
      statistics.corruptedFrames++;
      logger.trace(1, "Frame corrupted, dropped");
      return;
    }

    const { seqnum } = frame;
    if (!isSequenceNumber(seqnum, sequenceSpace)) {
      statistics.outOfWindowFrames++;
      logger.trace(1, `Frame ${seqnum} outside the sequence space, dropped`);
      return;
    }

    if (inWindow(seqnum, this.expectedSeqnum, windowSize, sequenceSpace)) {
      if (this.received.has(seqnum)) {
        statistics.duplicateFrames++;
        logger.trace(1, `Duplicate frame ${seqnum}, already buffered, resend ACK`);
        this.sendAck(seqnum);
        return;
      }

      if (seqnum === this.expectedSeqnum) {
        logger.trace(1, `Frame ${seqnum} is correctly received, send ACK`);
      } else {
        logger.trace(1, `Frame ${seqnum} correctly received but out of order, buffered`);
      }
      statistics.framesReceived++;
      this.buffered.set(seqnum, frame);
      this.received.add(seqnum);
      this.sendAck(seqnum);
      this.deliverContiguous();
      return;
    }

    const deliveredStart =
      (this.expectedSeqnum - windowSize + sequenceSpace * windowSize) % sequenceSpace;
    if (inWindow(seqnum, deliveredStart, windowSize, sequenceSpace)) {
      statistics.duplicateFrames++;
      logger.trace(1, `Frame ${seqnum} already delivered, resend ACK`);
      this.sendAck(seqnum);
      return;
    }

    // Unreachable when 2 * windowSize >= sequenceSpace, as with the 6/7 defaults.
    statistics.outOfWindowFrames++;
    logger.trace(1, `Frame ${seqnum} outside the receive window, dropped`);
  }

  private deliverContiguous(): void {
    const { sequenceSpace } = this.context.config;

    for (;;) {
      const frame = this.buffered.get(this.expectedSeqnum);
      if (!frame || !this.received.has(this.expectedSeqnum)) {
        return;
      }
      this.context.logger.trace(2, `Delivering frame ${this.expectedSeqnum}`);
      this.deliver(frame);
      this.received.delete(this.expectedSeqnum);
      this.buffered.delete(this.expectedSeqnum);
      this.expectedSeqnum = nextSequence(this.expectedSeqnum, sequenceSpace);
    }
  }
}
