import { createIntegrityChecker } from "./checksum";
import { resolveConfig } from "./config";
import type { ReceiverContext, SenderContext } from "./context";
import { ArqValidationError, RetryExhaustedError, SessionFailedError } from "./errors";
import { createTraceLogger, type TraceLogger } from "./logger";
import type { BaseReceiver } from "./receiver";
import type { BaseSender } from "./sender";
import { createStatistics, type TransportStatistics } from "./statistics";
import { createReceiver, createSender } from "./strategy";
import { RetransmissionTimer, realTimeScheduler } from "./timer";
import {
  ENDPOINT,
  PAYLOAD_SIZE,
  type ArqConfig,
  type Channel,
  type Endpoint,
  type Frame,
  type SubmitResult,
  type TimerScheduler,
} from "./types";

export interface TransportSessionOptions {
  config?: Partial<ArqConfig>;
  scheduler?: TimerScheduler;
}

/**
 * One unidirectional transfer: the sender at endpoint A, the receiver at
 * endpoint B, the retransmission timer and the counters they share.
 *
 * All state lives on the instance. Entry points run to completion and are
 * never re-entered: frames a channel hands back while `submit`, `receive` or
 * the timeout handler is running are queued and processed, in arrival order,
 * once it returns.
 */
export class TransportSession {
  readonly config: ArqConfig;
  private channel: Channel;
  private sender: BaseSender;
  private receiver: BaseReceiver;
  private timer: RetransmissionTimer;
  private stats: TransportStatistics = createStatistics();
  private logger: TraceLogger;
  private fatalError: RetryExhaustedError | null = null;
  private closed = false;
  private dispatching = false;
  private inbound: Array<{ to: Endpoint; frame: Frame }> = [];

  ondeliver: ((payload: Uint8Array) => void) | null = null;
  onfatal: ((error: RetryExhaustedError) => void) | null = null;

  constructor(channel: Channel, options: TransportSessionOptions = {}) {
    const { config, warnings } = resolveConfig(options.config);
    this.config = config;
    this.channel = channel;
    this.logger = createTraceLogger(`TransportSession:${config.name}`, config.trace);
    for (const warning of warnings) {
      this.logger.warn(warning);
    }

    this.timer = new RetransmissionTimer(
      options.scheduler ?? realTimeScheduler,
      () => this.handleTimeout()
    );

    const checker = createIntegrityChecker(config.checksum);
    const senderContext: SenderContext = {
      config,
      channel,
      checker,
      statistics: this.stats,
      logger: createTraceLogger(`Sender:${config.name}`, config.trace),
      timer: this.timer,
    };
    const receiverContext: ReceiverContext = {
      config,
      channel,
      checker,
      statistics: this.stats,
      logger: createTraceLogger(`Receiver:${config.name}`, config.trace),
      deliver: (payload) => this.handleDeliver(payload),
    };
    this.sender = createSender(senderContext);
    this.receiver = createReceiver(receiverContext);

    this.channel.onFrame = (to, frame) => this.receive(to, frame);
  }

  get statistics(): TransportStatistics {
    return { ...this.stats };
  }

  get failure(): RetryExhaustedError | null {
    return this.fatalError;
  }

  get failed(): boolean {
    return this.fatalError !== null;
  }

  get outstanding(): number {
    return this.sender.inFlight;
  }

  get isTimerRunning(): boolean {
    return this.timer.isRunning;
  }

  get senderBase(): number {
    return this.sender.base;
  }

  get receiverExpected(): number {
    return this.receiver.expected;
  }

  submit(message: Uint8Array): SubmitResult {
    if (this.fatalError) {
      throw new SessionFailedError(
        `Session ${this.config.name} has failed`,
        this.fatalError
      );
    }
    if (this.closed) {
      throw new SessionFailedError(`Session ${this.config.name} is closed`);
    }
    if (message.length !== PAYLOAD_SIZE) {
      throw new ArqValidationError(
        `Message must be exactly ${PAYLOAD_SIZE} bytes, got ${message.length}`
      );
    }
    return this.dispatch(() => this.sender.submit(message));
  }

  receive(to: Endpoint, frame: Frame): void {
    if (this.fatalError || this.closed) {
      return;
    }
    if (this.dispatching) {
      this.inbound.push({ to, frame });
      return;
    }
    this.dispatch(() => this.route(to, frame));
  }

  close(): void {
    this.closed = true;
    this.inbound.length = 0;
    this.timer.stop();
  }

  /**
   * Runs one entry point, then every frame queued while it ran. A call made
   * from inside a running entry point (an `ondeliver` handler submitting,
   * say) runs directly.
   */
  private dispatch<T>(entry: () => T): T {
    if (this.dispatching) {
      return entry();
    }

    this.dispatching = true;
    try {
      const result = entry();
      for (let next = this.inbound.shift(); next; next = this.inbound.shift()) {
        if (this.fatalError || this.closed) {
          break;
        }
        this.route(next.to, next.frame);
      }
      return result;
    } finally {
      this.dispatching = false;
      this.inbound.length = 0;
    }
  }

  private route(to: Endpoint, frame: Frame): void {
    if (to === ENDPOINT.A) {
      this.sender.onFrame(frame);
    } else {
      this.receiver.onFrame(frame);
    }
  }

  private handleTimeout(): void {
    if (this.fatalError || this.closed) {
      return;
    }

    const outcome = this.dispatch(() => this.sender.onTimeout());
    if (outcome.kind !== "exhausted") {
      return;
    }

    this.fatalError = outcome.error;
    this.timer.stop();
    this.logger.error("Fatal transport failure", outcome.error);
    if (this.onfatal) {
      this.onfatal(outcome.error);
    }
  }

  private handleDeliver(payload: Uint8Array): void {
    if (this.ondeliver) {
      this.ondeliver(payload);
    }
  }
}
