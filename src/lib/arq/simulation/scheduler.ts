import type { ScheduledTask, TimerScheduler } from "../types";

interface SimulationEvent {
  time: number;
  order: number;
  callback: () => void;
  cancelled: boolean;
}

/**
 * Discrete-event scheduler over a virtual clock. Events run in time order;
 * events due at the same time run in the order they were scheduled.
 */
export class EventScheduler implements TimerScheduler {
  private events: SimulationEvent[] = [];
  private clock = 0;
  private nextOrder = 0;
  private halted = false;

  get now(): number {
    return this.clock;
  }

  get pending(): number {
    return this.events.filter((event) => !event.cancelled).length;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  schedule(delay: number, callback: () => void): ScheduledTask {
    if (!(delay >= 0)) {
      throw new RangeError(`Event delay must be non-negative, got ${delay}`);
    }

    const event: SimulationEvent = {
      time: this.clock + delay,
      order: this.nextOrder++,
      callback,
      cancelled: false,
    };
    this.insert(event);

    return {
      cancel: () => {
        event.cancelled = true;
      },
    };
  }

  /** Runs the earliest pending event. Returns false when none is left. */
  runNext(): boolean {
    for (;;) {
      const event = this.events.shift();
      if (!event) {
        return false;
      }
      if (event.cancelled) {
        continue;
      }
      this.clock = event.time;
      event.callback();
      return true;
    }
  }

  /**
   * Runs events until the queue drains, `halt()` is called or the next event
   * lies beyond `until`. Returns the number of events run.
   */
  run(options: { until?: number } = {}): number {
    const until = options.until ?? Number.POSITIVE_INFINITY;
    let count = 0;
    this.halted = false;

    while (!this.halted) {
      const next = this.peek();
      if (!next || next.time > until) {
        break;
      }
      this.runNext();
      count++;
    }

    return count;
  }

  halt(): void {
    this.halted = true;
  }

  private peek(): SimulationEvent | undefined {
    while (this.events.length > 0 && this.events[0].cancelled) {
      this.events.shift();
    }
    return this.events[0];
  }

  private insert(event: SimulationEvent): void {
    let index = this.events.length;
    while (
      index > 0 &&
      (this.events[index - 1].time > event.time ||
        (this.events[index - 1].time === event.time &&
          this.events[index - 1].order > event.order))
    ) {
      index--;
    }
    this.events.splice(index, 0, event);
  }
}
