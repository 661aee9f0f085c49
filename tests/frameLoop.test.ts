import { afterEach, describe, expect, test, vi } from "vitest";
import { FrameLoop, type FrameScheduler } from "../src/core/render/frameLoop";

class ManualScheduler implements FrameScheduler {
  readonly pending = new Map<number, (nowMs: number) => void>();

  private nextId = 1;

  request(callback: (nowMs: number) => void): number {
    const id = this.nextId;
    this.nextId += 1;
    this.pending.set(id, callback);
    return id;
  }

  cancel(id: number): void {
    this.pending.delete(id);
  }

  runFrame(nowMs: number): void {
    const callbacks = [...this.pending.values()];
    this.pending.clear();
    for (const callback of callbacks) {
      callback(nowMs);
    }
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("FrameLoop", () => {
  test("reports seconds since the first frame", () => {
    const scheduler = new ManualScheduler();
    const times: number[] = [];
    const loop = new FrameLoop((timeSeconds) => times.push(timeSeconds), scheduler);

    loop.start();
    scheduler.runFrame(1000);
    scheduler.runFrame(1500);
    scheduler.runFrame(3000);

    expect(times).toEqual([0, 0.5, 2]);
  });

  test("requests a single frame when started twice and nothing after stop", () => {
    const scheduler = new ManualScheduler();
    const loop = new FrameLoop(() => undefined, scheduler);

    loop.start();
    loop.start();
    expect(scheduler.pending.size).toBe(1);

    loop.stop();
    expect(scheduler.pending.size).toBe(0);
    expect(loop.isRunning()).toBe(false);
  });

  test("keeps running after a frame throws", () => {
    const scheduler = new ManualScheduler();
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const loop = new FrameLoop(() => {
      throw new Error("lost context");
    }, scheduler);

    loop.start();
    scheduler.runFrame(0);

    expect(error).toHaveBeenCalledTimes(1);
    expect(scheduler.pending.size).toBe(1);
  });
});
