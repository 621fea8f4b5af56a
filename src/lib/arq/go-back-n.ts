import { BaseReceiver } from "./receiver";
import { BaseSender } from "./sender";
import {
  inWindow,
  isSequenceNumber,
  nextSequence,
  previousSequence,
} from "./sequence";
import type { Frame, TimeoutOutcome } from "./types";

/**
 * Go-Back-N sender: acknowledgments are cumulative and a timeout resends
 * every outstanding frame.
 */
export class GoBackNSender extends BaseSender {
  onFrame(frame: Frame): void {
    const { checker, statistics, logger } = this.context;

    if (checker.isCorrupted(frame)) {
      statistics.corruptedAcks++;
      logger.trace(1, "Corrupted ACK is received, do nothing");
      return;
    }

    statistics.acksReceived++;
    const { acknum } = frame;

    if (!this.isOutstanding(acknum)) {
      statistics.duplicateAcks++;
      logger.trace(1, `Duplicate ACK ${acknum}, do nothing`);
      return;
    }

    logger.trace(1, `Cumulative ACK ${acknum} is received`);
    statistics.newAcks++;

    const target = nextSequence(acknum, this.context.config.sequenceSpace);
    while (this.base !== target) {
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

    logger.trace(1, "Timeout, resend all unacknowledged frames");
    const seqnums: number[] = [];
    let seqnum = this.base;
    for (let i = 0; i < this.inFlight; i++) {
      logger.trace(2, `Resending frame ${seqnum}`);
      this.transmit(this.frameAt(seqnum));
      statistics.framesResent++;
      seqnums.push(seqnum);
      seqnum = nextSequence(seqnum, config.sequenceSpace);
    }

    this.recordRetransmission(this.base);
    timer.start(config.retransmissionTimeout);

    return { kind: "retransmitted", seqnums };
  }
}

/**
 * Go-Back-N receiver: accepts only the next in-order frame. Anything else is
 * discarded and answered with a duplicate ACK for the last in-order frame.
 */
export class GoBackNReceiver extends BaseReceiver {
  onFrame(frame: Frame): void {
    const { checker, config, statistics, logger } = this.context;
    const { windowSize, sequenceSpace } = config;
    const lastInOrder = previousSequence(this.expectedSeqnum, sequenceSpace);

    if (checker.isCorrupted(frame)) {
      statistics.corruptedFrames++;
      logger.trace(1, "Frame corrupted, resend ACK");
      this.sendAck(lastInOrder);
      return;
    }

    const { seqnum } = frame;
    if (seqnum === this.expectedSeqnum) {
      logger.trace(1, `Frame ${seqnum} is correctly received, send ACK`);
      statistics.framesReceived++;
      this.sendAck(seqnum);
      this.deliver(frame);
      this.expectedSeqnum = nextSequence(seqnum, sequenceSpace);
      return;
    }

    const deliveredStart =
      (this.expectedSeqnum - windowSize + sequenceSpace * windowSize) % sequenceSpace;
    if (
      isSequenceNumber(seqnum, sequenceSpace) &&
      inWindow(seqnum, deliveredStart, windowSize, sequenceSpace)
    ) {
      statistics.duplicateFrames++;
    } else {
      statistics.outOfWindowFrames++;
    }
    logger.trace(1, `Frame ${seqnum} not expected (${this.expectedSeqnum}), resend ACK`);
    this.sendAck(lastInOrder);
  }
}
