import type { SenderContext } from "./context";
import { ArqError, RetryExhaustedError } from "./errors";
import { cloneFrame, createDataFrame } from "./frame";
import {
  inWindow,
  isSequenceNumber,
  modularDistance,
  nextSequence,
} from "./sequence";
import {
  ENDPOINT,
  type ArqSender,
  type Frame,
  type SubmitResult,
  type TimeoutOutcome,
} from "./types";

/**
 * Sliding-window bookkeeping shared by both sender strategies: framing,
 * the outstanding buffer, retry counters and the window-full boundary.
 * Subclasses decide how acknowledgments slide the window and what a
 * timeout retransmits.
 */
export abstract class BaseSender implements ArqSender {
  protected readonly context: SenderContext;
  protected readonly outstanding: Map<number, Frame> = new Map();
  protected readonly retries: Map<number, number> = new Map();
  private baseSeqnum: number = 0;
  private next: number = 0;

  constructor(context: SenderContext) {
    this.context = context;
  }

  get base(): number {
    return this.baseSeqnum;
  }

  get nextSeqnum(): number {
    return this.next;
  }

  get inFlight(): number {
    return modularDistance(this.next, this.baseSeqnum, this.context.config.sequenceSpace);
  }

  retriesFor(seqnum: number): number | undefined {
    return this.retries.get(seqnum);
  }

  submit(message: Uint8Array): SubmitResult {
    const { config, checker, statistics, logger, timer } = this.context;

    if (this.inFlight >= config.windowSize) {
      statistics.windowFull++;
      logger.trace(1, "New message arrives, send window is full");
      return { accepted: false, reason: "window-full" };
    }

    const seqnum = this.next;
    const frame = createDataFrame(seqnum, message, checker);
    const windowWasEmpty = this.inFlight === 0;

    this.outstanding.set(seqnum, frame);
    this.retries.set(seqnum, 0);

    logger.trace(1, `Sending frame ${seqnum}`);
    this.transmit(frame);
    statistics.framesSent++;

    if (windowWasEmpty) {
      timer.start(config.retransmissionTimeout);
    }

    this.next = nextSequence(seqnum, config.sequenceSpace);
    return { accepted: true, seqnum };
  }

  abstract onFrame(frame: Frame): void;

  abstract onTimeout(): TimeoutOutcome;

  protected transmit(frame: Frame): void {
    this.context.channel.send(ENDPOINT.A, cloneFrame(frame));
  }

  protected isOutstanding(seqnum: number): boolean {
    const { sequenceSpace } = this.context.config;
    return (
      isSequenceNumber(seqnum, sequenceSpace) &&
      inWindow(seqnum, this.baseSeqnum, this.inFlight, sequenceSpace)
    );
  }

  protected frameAt(seqnum: number): Frame {
    const frame = this.outstanding.get(seqnum);
    if (!frame) {
      throw new ArqError(`No outstanding frame buffered for sequence ${seqnum}`);
    }
    return frame;
  }

  protected advanceBase(): void {
    this.outstanding.delete(this.baseSeqnum);
    this.retries.delete(this.baseSeqnum);
    this.baseSeqnum = nextSequence(this.baseSeqnum, this.context.config.sequenceSpace);
  }

  protected restartOrStopTimer(): void {
    const { timer, config } = this.context;
    if (this.inFlight > 0) {
      timer.start(config.retransmissionTimeout);
    } else {
      timer.stop();
    }
  }

  /**
   * Returns the exhausted outcome when the base frame has used up its
   * retransmissions, after stopping the timer; null otherwise.
   */
  protected checkRetryLimit(): TimeoutOutcome | null {
    const { config, timer, logger } = this.context;
    const attempts = this.retries.get(this.baseSeqnum) ?? 0;
    if (attempts < config.maxRetransmissionAttempts) {
      return null;
    }

    timer.stop();
    logger.trace(1, `Frame ${this.baseSeqnum} exhausted ${attempts} retransmissions`);
    return {
      kind: "exhausted",
      error: new RetryExhaustedError(this.baseSeqnum, attempts),
    };
  }

  protected recordRetransmission(seqnum: number): void {
    this.retries.set(seqnum, (this.retries.get(seqnum) ?? 0) + 1);
  }
}
