import { cloneFrame } from "../frame";
import {
  ENDPOINT,
  type Channel,
  type Endpoint,
  type Frame,
  type TimerScheduler,
} from "../types";

export interface SimulatedChannelOptions {
  scheduler: TimerScheduler & { readonly now: number };
  lossProbability?: number;
  corruptionProbability?: number;
  random?: () => number;
  trace?: number;
}

export interface ChannelStatistics {
  carried: number;
  lost: number;
  corrupted: number;
}

/** Value written over a header field when the channel corrupts it. */
export const CORRUPTED_FIELD_VALUE = 999999;
/** Byte written over the first payload byte when the channel corrupts it ('Z'). */
export const CORRUPTED_PAYLOAD_BYTE = 0x5a;

/**
 * A lossy, corrupting, delaying medium between the two endpoints.
 *
 * Each frame is independently lost or corrupted, then delivered after
 * 1 to 10 time units. Frames headed to the same endpoint never overtake
 * each other.
 */
export class SimulatedChannel implements Channel {
  private scheduler: TimerScheduler & { readonly now: number };
  private lossProbability: number;
  private corruptionProbability: number;
  private random: () => number;
  private trace: number;
  private lastArrival: Record<Endpoint, number> = { A: 0, B: 0 };
  private stats: ChannelStatistics = { carried: 0, lost: 0, corrupted: 0 };

  onFrame?: (to: Endpoint, frame: Frame) => void;

  constructor(options: SimulatedChannelOptions) {
    this.scheduler = options.scheduler;
    this.lossProbability = options.lossProbability ?? 0;
    this.corruptionProbability = options.corruptionProbability ?? 0;
    this.random = options.random ?? Math.random;
    this.trace = options.trace ?? 0;
  }

  get statistics(): ChannelStatistics {
    return { ...this.stats };
  }

  send(from: Endpoint, frame: Frame): void {
    const to = from === ENDPOINT.A ? ENDPOINT.B : ENDPOINT.A;
    this.stats.carried++;

    if (this.random() < this.lossProbability) {
      this.stats.lost++;
      if (this.trace > 0) {
        console.log(`[SimulatedChannel] Frame from ${from} being lost`);
      }
      return;
    }

    let carried = cloneFrame(frame);
    if (this.random() < this.corruptionProbability) {
      this.stats.corrupted++;
      carried = this.corrupt(carried);
      if (this.trace > 0) {
        console.log(`[SimulatedChannel] Frame from ${from} being corrupted`);
      }
    }

    const now = this.scheduler.now;
    const arrival = Math.max(this.lastArrival[to], now) + 1 + 9 * this.random();
    this.lastArrival[to] = arrival;

    this.scheduler.schedule(arrival - now, () => {
      if (this.onFrame) {
        this.onFrame(to, carried);
      }
    });
  }

  private corrupt(frame: Frame): Frame {
    const x = this.random();
    if (x < 0.75) {
      const payload = new Uint8Array(frame.payload);
      payload[0] = CORRUPTED_PAYLOAD_BYTE;
      return { ...frame, payload };
    }
    if (x < 0.875) {
      return { ...frame, seqnum: CORRUPTED_FIELD_VALUE };
    }
    return { ...frame, acknum: CORRUPTED_FIELD_VALUE };
  }
}
