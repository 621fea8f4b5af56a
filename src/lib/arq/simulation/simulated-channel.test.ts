import { describe, it, expect } from "vitest";
import { EventScheduler } from "./scheduler";
import {
  CORRUPTED_FIELD_VALUE,
  CORRUPTED_PAYLOAD_BYTE,
  SimulatedChannel,
  type SimulatedChannelOptions,
} from "./simulated-channel";
import type { Endpoint, Frame } from "../types";
import { dataFrame, scriptedRandom } from "../__tests__/test-utils";

interface Arrival {
  time: number;
  to: Endpoint;
  frame: Frame;
}

function createChannel(options: Omit<SimulatedChannelOptions, "scheduler">) {
  const scheduler = new EventScheduler();
  const channel = new SimulatedChannel({ scheduler, ...options });
  const arrivals: Arrival[] = [];
  channel.onFrame = (to, frame) => arrivals.push({ time: scheduler.now, to, frame });
  return { scheduler, channel, arrivals };
}

describe("SimulatedChannel", () => {
  it("delivers to the other endpoint after 1 + 9 * random time units", () => {
    const { scheduler, channel, arrivals } = createChannel({ random: () => 0.5 });

    channel.send("A", dataFrame(0));
    channel.send("B", dataFrame(1));
    scheduler.run();

    expect(arrivals.map(({ time, to }) => ({ time, to }))).toEqual([
      { time: 5.5, to: "B" },
      { time: 5.5, to: "A" },
    ]);
    expect(channel.statistics).toEqual({ carried: 2, lost: 0, corrupted: 0 });
  });

  it("never lets a frame overtake an earlier one to the same endpoint", () => {
    const { scheduler, channel, arrivals } = createChannel({
      random: scriptedRandom([0, 0, 0.5, 0, 0, 0]),
    });

    channel.send("A", dataFrame(0));
    channel.send("A", dataFrame(1));
    scheduler.run();

    expect(arrivals.map(({ time, frame }) => [time, frame.seqnum])).toEqual([
      [5.5, 0],
      [6.5, 1],
    ]);
  });

  it("loses frames with the configured probability", () => {
    const { scheduler, channel, arrivals } = createChannel({
      lossProbability: 0.5,
      random: scriptedRandom([0.2]),
    });

    channel.send("A", dataFrame(0));

    expect(scheduler.pending).toBe(0);
    scheduler.run();
    expect(arrivals).toHaveLength(0);
    expect(channel.statistics).toEqual({ carried: 1, lost: 1, corrupted: 0 });
  });

  it.each<[number, string]>([
    [0.5, "payload"],
    [0.8, "seqnum"],
    [0.9, "acknum"],
  ])("with pattern draw %s corrupts the %s", (draw, field) => {
    const { scheduler, channel, arrivals } = createChannel({
      corruptionProbability: 0.5,
      random: scriptedRandom([0.9, 0.1, draw, 0.5]),
    });
    const original = dataFrame(3);

    channel.send("A", original);
    scheduler.run();

    const { frame } = arrivals[0];
    expect(frame.payload[0]).toBe(field === "payload" ? CORRUPTED_PAYLOAD_BYTE : 0x64);
    expect(frame.seqnum).toBe(field === "seqnum" ? CORRUPTED_FIELD_VALUE : 3);
    expect(frame.acknum).toBe(field === "acknum" ? CORRUPTED_FIELD_VALUE : -1);
    expect(frame.checksum).toBe(original.checksum);
    expect(arrivals[0].time).toBe(5.5);
    expect(channel.statistics.corrupted).toBe(1);
  });

  it("leaves the sender's copy untouched", () => {
    const { scheduler, channel } = createChannel({
      corruptionProbability: 1,
      random: scriptedRandom([0.9, 0.1, 0.5, 0.5]),
    });
    const original = dataFrame(3);

    channel.send("A", original);
    scheduler.run();

    expect(original.payload[0]).toBe(0x64);
  });
});
