import type { ScheduledTask, TimerScheduler } from "./types";

export const realTimeScheduler: TimerScheduler = {
  schedule(delay, callback) {
    const timerId = setTimeout(callback, delay);
    return {
      cancel: () => clearTimeout(timerId),
    };
  },
};

/**
 * The single retransmission timer of a sending endpoint.
 *
 * Starting cancels any pending instance first, so at most one expiry is ever
 * pending. Expiry does not re-arm; the owner restarts it explicitly.
 */
export class RetransmissionTimer {
  private task: ScheduledTask | null = null;
  private scheduler: TimerScheduler;
  private onExpire: () => void;

  constructor(scheduler: TimerScheduler, onExpire: () => void) {
    this.scheduler = scheduler;
    this.onExpire = onExpire;
  }

  get isRunning(): boolean {
    return this.task !== null;
  }

  start(duration: number): void {
    this.stop();
    const task = this.scheduler.schedule(duration, () => {
      if (this.task !== task) {
        return;
      }
      this.task = null;
      this.onExpire();
    });
    this.task = task;
  }

  stop(): void {
    if (this.task) {
      this.task.cancel();
      this.task = null;
    }
  }
}
