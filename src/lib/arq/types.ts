import type { RetryExhaustedError } from "./errors";

export interface UnreliableCommunicator {
  send(data: ArrayBuffer, onComplete?: () => void): void;
  onReceive?: (data: ArrayBuffer) => void;
  onError?: (error: Error) => void;
}

export const ENDPOINT = {
  A: "A",
  B: "B",
} as const;

export type Endpoint = typeof ENDPOINT.A | typeof ENDPOINT.B;

export const ARQ_STRATEGY = {
  SELECTIVE_REPEAT: "selective-repeat",
  GO_BACK_N: "go-back-n",
} as const;

export type ArqStrategy =
  | typeof ARQ_STRATEGY.SELECTIVE_REPEAT
  | typeof ARQ_STRATEGY.GO_BACK_N;

export type ChecksumAlgorithm = "additive" | "crc32";

export const PAYLOAD_SIZE = 20;
export const NOT_IN_USE = -1;
export const ACK_FILL_BYTE = 0x30;

export interface Frame {
  readonly seqnum: number;
  readonly acknum: number;
  readonly checksum: number;
  readonly payload: Uint8Array;
}

export type FrameFields = Omit<Frame, "checksum">;

export interface Channel {
  send(from: Endpoint, frame: Frame): void;
  onFrame?: (to: Endpoint, frame: Frame) => void;
}

export interface ScheduledTask {
  cancel(): void;
}

export interface TimerScheduler {
  schedule(delay: number, callback: () => void): ScheduledTask;
}

export interface ArqConfig {
  name: string;
  strategy: ArqStrategy;
  windowSize: number;
  sequenceSpace: number;
  retransmissionTimeout: number;
  maxRetransmissionAttempts: number;
  checksum: ChecksumAlgorithm;
  strictSequenceSpace: boolean;
  trace: number;
}

export const DEFAULT_CONFIG: ArqConfig = {
  name: "arq",
  strategy: ARQ_STRATEGY.SELECTIVE_REPEAT,
  windowSize: 6,
  sequenceSpace: 7,
  retransmissionTimeout: 16,
  maxRetransmissionAttempts: 10,
  checksum: "additive",
  strictSequenceSpace: false,
  trace: 0,
};

export type SubmitResult =
  | { accepted: true; seqnum: number }
  | { accepted: false; reason: "window-full" };

export type TimeoutOutcome =
  | { kind: "idle" }
  | { kind: "retransmitted"; seqnums: number[] }
  | { kind: "exhausted"; error: RetryExhaustedError };

export interface ArqSender {
  readonly base: number;
  readonly nextSeqnum: number;
  readonly inFlight: number;
  submit(message: Uint8Array): SubmitResult;
  onFrame(frame: Frame): void;
  onTimeout(): TimeoutOutcome;
}

export interface ArqReceiver {
  readonly expected: number;
  onFrame(frame: Frame): void;
}
