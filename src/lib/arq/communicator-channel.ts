import { decodeFrame, encodeFrame } from "./frame";
import {
  ENDPOINT,
  type Channel,
  type Endpoint,
  type Frame,
  type UnreliableCommunicator,
} from "./types";

export interface CommunicatorEndpoints {
  A: UnreliableCommunicator;
  B: UnreliableCommunicator;
}

/**
 * Carries frames as 32-byte datagrams over one unreliable communicator per
 * endpoint. Each communicator sends on behalf of its endpoint and hands
 * back whatever arrives for it.
 */
export class CommunicatorChannel implements Channel {
  private communicators: CommunicatorEndpoints;
  private malformedCount = 0;

  onFrame?: (to: Endpoint, frame: Frame) => void;
  onerror: ((endpoint: Endpoint, error: Error) => void) | null = null;

  constructor(communicators: CommunicatorEndpoints) {
    this.communicators = communicators;

    for (const endpoint of [ENDPOINT.A, ENDPOINT.B] as const) {
      const communicator = communicators[endpoint];
      communicator.onReceive = (data) => this.handleReceivedData(endpoint, data);
      communicator.onError = (error) => this.handleError(endpoint, error);
    }
  }

  get malformed(): number {
    return this.malformedCount;
  }

  send(from: Endpoint, frame: Frame): void {
    this.communicators[from].send(encodeFrame(frame));
  }

  private handleReceivedData(to: Endpoint, data: ArrayBuffer): void {
    const frame = decodeFrame(data);
    if (!frame) {
      this.malformedCount++;
      console.warn(
        `[CommunicatorChannel] Dropping malformed datagram of ${data.byteLength} bytes for ${to}`
      );
      return;
    }

    if (this.onFrame) {
      this.onFrame(to, frame);
    }
  }

  private handleError(endpoint: Endpoint, error: Error): void {
    if (this.onerror) {
      this.onerror(endpoint, error);
    }
  }
}
