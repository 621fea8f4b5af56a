import { additiveChecker, type IntegrityChecker } from "../checksum";
import { resolveConfig } from "../config";
import { cloneFrame, createAckFrame, createDataFrame } from "../frame";
import { createTraceLogger } from "../logger";
import type { ReceiverContext, SenderContext } from "../context";
import type { BaseReceiver } from "../receiver";
import type { BaseSender } from "../sender";
import { createStatistics, type TransportStatistics } from "../statistics";
import { RetransmissionTimer } from "../timer";
import {
  PAYLOAD_SIZE,
  type ArqConfig,
  type Channel,
  type Endpoint,
  type Frame,
  type ScheduledTask,
  type TimeoutOutcome,
  type TimerScheduler,
} from "../types";

export function createMessage(fill: number): Uint8Array {
  return new Uint8Array(PAYLOAD_SIZE).fill(fill);
}

/** Messages whose bytes are 0x61 ('a'), 0x62, ... so each one is distinguishable. */
export function createMessages(count: number): Uint8Array[] {
  return Array.from({ length: count }, (_, i) => createMessage(0x61 + i));
}

export function dataFrame(
  seqnum: number,
  fill: number = 0x61 + seqnum,
  checker: IntegrityChecker = additiveChecker
): Frame {
  return createDataFrame(seqnum, createMessage(fill), checker);
}

export function ackFrame(
  acknum: number,
  checker: IntegrityChecker = additiveChecker
): Frame {
  return createAckFrame(0, acknum, checker);
}

export function corruptFrame(frame: Frame): Frame {
  const payload = new Uint8Array(frame.payload);
  payload[0] = (payload[0] + 1) % 256;
  return { ...frame, payload };
}

/** Returns the given values in order and throws once they run out. */
export function scriptedRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    if (index >= values.length) {
      throw new Error(`scriptedRandom exhausted after ${values.length} values`);
    }
    return values[index++];
  };
}

/** Small deterministic generator for long randomized runs. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export interface SentFrame {
  from: Endpoint;
  frame: Frame;
}

/** Records every frame handed to it and delivers nothing. */
export class RecordingChannel implements Channel {
  readonly sent: SentFrame[] = [];
  onFrame?: (to: Endpoint, frame: Frame) => void;

  send(from: Endpoint, frame: Frame): void {
    this.sent.push({ from, frame: cloneFrame(frame) });
  }

  get frames(): Frame[] {
    return this.sent.map((entry) => entry.frame);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export type FrameFate = "deliver" | "drop" | "corrupt";

/**
 * In-process channel that queues frames and delivers them one at a time on
 * flush(), so no entry point is ever re-entered. `fate` decides what happens
 * to each frame as it is delivered.
 */
export class QueueChannel implements Channel {
  private queue: SentFrame[] = [];
  readonly log: SentFrame[] = [];
  fate: (from: Endpoint, frame: Frame) => FrameFate = () => "deliver";
  onFrame?: (to: Endpoint, frame: Frame) => void;

  send(from: Endpoint, frame: Frame): void {
    const copy = cloneFrame(frame);
    this.log.push({ from, frame: copy });
    this.queue.push({ from, frame: copy });
  }

  flush(): number {
    let delivered = 0;
    for (;;) {
      const next = this.queue.shift();
      if (!next) {
        return delivered;
      }
      const fate = this.fate(next.from, next.frame);
      if (fate === "drop") {
        continue;
      }
      const frame = fate === "corrupt" ? corruptFrame(next.frame) : next.frame;
      const to: Endpoint = next.from === "A" ? "B" : "A";
      if (this.onFrame) {
        this.onFrame(to, frame);
      }
      delivered++;
    }
  }
}

interface ManualTask {
  delay: number;
  callback: () => void;
  cancelled: boolean;
}

/** Timer scheduler that only fires when told to. */
export class ManualScheduler implements TimerScheduler {
  readonly tasks: ManualTask[] = [];

  schedule(delay: number, callback: () => void): ScheduledTask {
    const task: ManualTask = { delay, callback, cancelled: false };
    this.tasks.push(task);
    return {
      cancel: () => {
        task.cancelled = true;
      },
    };
  }

  get active(): ManualTask[] {
    return this.tasks.filter((task) => !task.cancelled);
  }

  fire(): void {
    const [task] = this.active;
    if (!task) {
      throw new Error("No active timer to fire");
    }
    task.cancelled = true;
    task.callback();
  }
}

function testConfig(overrides: Partial<ArqConfig>): ArqConfig {
  return resolveConfig({ name: "test", ...overrides }).config;
}

export interface SenderHarness<T extends BaseSender> {
  sender: T;
  channel: RecordingChannel;
  scheduler: ManualScheduler;
  timer: RetransmissionTimer;
  statistics: TransportStatistics;
  outcomes: TimeoutOutcome[];
  config: ArqConfig;
}

export function createSenderHarness<T extends BaseSender>(
  factory: (context: SenderContext) => T,
  overrides: Partial<ArqConfig> = {}
): SenderHarness<T> {
  const config = testConfig(overrides);
  const channel = new RecordingChannel();
  const scheduler = new ManualScheduler();
  const statistics = createStatistics();
  const outcomes: TimeoutOutcome[] = [];
  const timer = new RetransmissionTimer(scheduler, () => {
    outcomes.push(sender.onTimeout());
  });
  const sender = factory({
    config,
    channel,
    checker: additiveChecker,
    statistics,
    logger: createTraceLogger("Sender:test", 0),
    timer,
  });
  return { sender, channel, scheduler, timer, statistics, outcomes, config };
}

export interface ReceiverHarness<T extends BaseReceiver> {
  receiver: T;
  channel: RecordingChannel;
  delivered: Uint8Array[];
  statistics: TransportStatistics;
  config: ArqConfig;
}

export function createReceiverHarness<T extends BaseReceiver>(
  factory: (context: ReceiverContext) => T,
  overrides: Partial<ArqConfig> = {}
): ReceiverHarness<T> {
  const config = testConfig(overrides);
  const channel = new RecordingChannel();
  const statistics = createStatistics();
  const delivered: Uint8Array[] = [];
  const receiver = factory({
    config,
    channel,
    checker: additiveChecker,
    statistics,
    logger: createTraceLogger("Receiver:test", 0),
    deliver: (payload) => delivered.push(payload),
  });
  return { receiver, channel, delivered, statistics, config };
}
