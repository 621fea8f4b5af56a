import type { ReceiverContext } from "./context";
import { createAckFrame } from "./frame";
import { nextSequence } from "./sequence";
import { ENDPOINT, type ArqReceiver, type Frame } from "./types";

export abstract class BaseReceiver implements ArqReceiver {
  protected readonly context: ReceiverContext;
  protected expectedSeqnum: number = 0;
  private ackSeq: number = 0;

  constructor(context: ReceiverContext) {
    this.context = context;
  }

  get expected(): number {
    return this.expectedSeqnum;
  }

  abstract onFrame(frame: Frame): void;

  /** Acknowledgment frames are numbered from their own counter, unrelated to data sequence numbers. */
  protected sendAck(acknum: number): void {
    const { channel, checker, config, statistics } = this.context;
    const ack = createAckFrame(this.ackSeq, acknum, checker);
    this.ackSeq = nextSequence(this.ackSeq, config.sequenceSpace);
    channel.send(ENDPOINT.B, ack);
    statistics.acksSent++;
  }

  protected deliver(frame: Frame): void {
    this.context.deliver(new Uint8Array(frame.payload));
    this.context.statistics.framesDelivered++;
  }
}
