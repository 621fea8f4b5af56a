import { describe, it, expect } from "vitest";
import {
  inWindow,
  isSequenceNumber,
  modularDistance,
  nextSequence,
  previousSequence,
} from "./sequence";

describe("modularDistance", () => {
  it("counts forward from `from` to `to`", () => {
    expect(modularDistance(5, 2, 7)).toBe(3);
    expect(modularDistance(1, 5, 7)).toBe(3);
    expect(modularDistance(4, 4, 7)).toBe(0);
  });

  it("stays non-negative for negative inputs", () => {
    expect(modularDistance(-1, 0, 7)).toBe(6);
  });
});

describe("inWindow", () => {
  it("accepts sequence numbers from the start up to the window size", () => {
    expect(inWindow(2, 2, 3, 7)).toBe(true);
    expect(inWindow(4, 2, 3, 7)).toBe(true);
    expect(inWindow(5, 2, 3, 7)).toBe(false);
    expect(inWindow(1, 2, 3, 7)).toBe(false);
  });

  it("wraps around the end of the sequence space", () => {
    expect(inWindow(6, 5, 3, 7)).toBe(true);
    expect(inWindow(0, 5, 3, 7)).toBe(true);
    expect(inWindow(1, 5, 3, 7)).toBe(false);
  });

  it("is empty for a zero-sized window", () => {
    expect(inWindow(3, 3, 0, 7)).toBe(false);
  });
});

describe("nextSequence / previousSequence", () => {
  it("wraps at the modulus", () => {
    expect(nextSequence(5, 7)).toBe(6);
    expect(nextSequence(6, 7)).toBe(0);
    expect(previousSequence(0, 7)).toBe(6);
    expect(previousSequence(3, 7)).toBe(2);
  });
});

describe("isSequenceNumber", () => {
  it("accepts integers inside the sequence space only", () => {
    expect(isSequenceNumber(0, 7)).toBe(true);
    expect(isSequenceNumber(6, 7)).toBe(true);
    expect(isSequenceNumber(7, 7)).toBe(false);
    expect(isSequenceNumber(-1, 7)).toBe(false);
    expect(isSequenceNumber(999999, 7)).toBe(false);
    expect(isSequenceNumber(2.5, 7)).toBe(false);
  });
});
