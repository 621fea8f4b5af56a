import type { IntegrityChecker } from "./checksum";
import type { TraceLogger } from "./logger";
import type { TransportStatistics } from "./statistics";
import type { RetransmissionTimer } from "./timer";
import type { ArqConfig, Channel } from "./types";

export interface EndpointContext {
  config: ArqConfig;
  channel: Channel;
  checker: IntegrityChecker;
  statistics: TransportStatistics;
  logger: TraceLogger;
}

export interface SenderContext extends EndpointContext {
  timer: RetransmissionTimer;
}

export interface ReceiverContext extends EndpointContext {
  deliver: (payload: Uint8Array) => void;
}
