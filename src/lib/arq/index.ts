export type {
  ArqConfig,
  ArqReceiver,
  ArqSender,
  ArqStrategy,
  Channel,
  ChecksumAlgorithm,
  Endpoint,
  Frame,
  ScheduledTask,
  SubmitResult,
  TimeoutOutcome,
  TimerScheduler,
  UnreliableCommunicator,
} from "./types";
export {
  ARQ_STRATEGY,
  DEFAULT_CONFIG,
  ENDPOINT,
  NOT_IN_USE,
  PAYLOAD_SIZE,
} from "./types";
export {
  ArqConfigError,
  ArqError,
  ArqValidationError,
  RetryExhaustedError,
  SessionFailedError,
} from "./errors";
export type { IntegrityChecker } from "./checksum";
export { computeChecksum, createIntegrityChecker, isCorrupted } from "./checksum";
export { createAckFrame, createDataFrame, decodeFrame, encodeFrame, FRAME_SIZE } from "./frame";
export { inWindow, modularDistance } from "./sequence";
export { resolveConfig, validateConfig } from "./config";
export type { TransportStatistics } from "./statistics";
export { RetransmissionTimer, realTimeScheduler } from "./timer";
export { SelectiveRepeatReceiver, SelectiveRepeatSender } from "./selective-repeat";
export { GoBackNReceiver, GoBackNSender } from "./go-back-n";
export { TransportSession } from "./session";
export type { TransportSessionOptions } from "./session";
export { CommunicatorChannel } from "./communicator-channel";
export { EventScheduler } from "./simulation/scheduler";
export { SimulatedChannel } from "./simulation/simulated-channel";
export type { ChannelStatistics, SimulatedChannelOptions } from "./simulation/simulated-channel";
export { runSimulation } from "./simulation/emulator";
export type { SimulationOptions, SimulationReport } from "./simulation/emulator";
