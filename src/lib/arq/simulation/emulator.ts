import type { RetryExhaustedError } from "../errors";
import { TransportSession } from "../session";
import type { TransportStatistics } from "../statistics";
import { PAYLOAD_SIZE, type ArqConfig } from "../types";
import { EventScheduler } from "./scheduler";
import { SimulatedChannel, type ChannelStatistics } from "./simulated-channel";

export interface SimulationOptions {
  messages: number;
  lossProbability?: number;
  corruptionProbability?: number;
  /** Average time between messages handed down by the application. */
  meanInterval?: number;
  maxTime?: number;
  random?: () => number;
  config?: Partial<ArqConfig>;
}

export interface SimulationReport {
  statistics: TransportStatistics;
  channel: ChannelStatistics;
  messagesGenerated: number;
  accepted: Uint8Array[];
  delivered: Uint8Array[];
  inOrder: boolean;
  elapsed: number;
  failure: RetryExhaustedError | null;
}

export const DEFAULT_MEAN_INTERVAL = 1000;

/** Message `index` is PAYLOAD_SIZE copies of the letter 'a' + index mod 26. */
export function createSimulationMessage(index: number): Uint8Array {
  return new Uint8Array(PAYLOAD_SIZE).fill(0x61 + (index % 26));
}

function samePayloads(a: Uint8Array[], b: Uint8Array[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every(
    (payload, i) =>
      payload.length === b[i].length &&
      payload.every((byte, j) => byte === b[i][j])
  );
}

/**
 * Drives one session over a simulated channel: the application submits
 * `messages` messages at random intervals and the run continues until
 * every event has been processed, `maxTime` is reached or the session
 * fails. Messages refused because the window was full are dropped by the
 * application and show up in `statistics.windowFull`.
 */
export function runSimulation(options: SimulationOptions): SimulationReport {
  const random = options.random ?? Math.random;
  const meanInterval = options.meanInterval ?? DEFAULT_MEAN_INTERVAL;
  const trace = options.config?.trace ?? 0;

  const scheduler = new EventScheduler();
  const channel = new SimulatedChannel({
    scheduler,
    lossProbability: options.lossProbability,
    corruptionProbability: options.corruptionProbability,
    random,
    trace,
  });
  const session = new TransportSession(channel, {
    config: options.config,
    scheduler,
  });

  const accepted: Uint8Array[] = [];
  const delivered: Uint8Array[] = [];
  let messagesGenerated = 0;

  session.ondeliver = (payload) => {
    delivered.push(payload);
  };
  session.onfatal = () => {
    scheduler.halt();
  };

  const scheduleNextMessage = (): void => {
    if (messagesGenerated >= options.messages) {
      return;
    }
    scheduler.schedule(2 * meanInterval * random(), () => {
      const message = createSimulationMessage(messagesGenerated);
      messagesGenerated++;
      const result = session.submit(message);
      if (result.accepted) {
        accepted.push(message);
      }
      scheduleNextMessage();
    });
  };

  scheduleNextMessage();
  scheduler.run({ until: options.maxTime });
  session.close();

  if (trace > 0) {
    console.log(
      `[Emulator] Simulation stopped at time ${scheduler.now.toFixed(3)} after ${messagesGenerated} messages`
    );
  }

  return {
    statistics: session.statistics,
    channel: channel.statistics,
    messagesGenerated,
    accepted,
    delivered,
    inOrder: samePayloads(accepted.slice(0, delivered.length), delivered),
    elapsed: scheduler.now,
    failure: session.failure,
  };
}
