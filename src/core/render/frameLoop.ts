export interface FrameScheduler {
  request(callback: (nowMs: number) => void): number;
  cancel(id: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (id) => cancelAnimationFrame(id)
};

/** Calls `onFrame` with seconds since `start()` once per animation frame. */
export class FrameLoop {
  private readonly onFrame: (timeSeconds: number) => void;

  private readonly scheduler: FrameScheduler;

  private frameId = 0;

  private running = false;

  private startMs: number | null = null;

  constructor(onFrame: (timeSeconds: number) => void, scheduler: FrameScheduler = animationFrameScheduler) {
    this.onFrame = onFrame;
    this.scheduler = scheduler;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.startMs = null;
    this.frameId = this.scheduler.request(this.tick);
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.scheduler.cancel(this.frameId);
  }

  private readonly tick = (nowMs: number): void => {
    if (!this.running) {
      return;
    }
    if (this.startMs === null) {
      this.startMs = nowMs;
    }
    try {
      this.onFrame((nowMs - this.startMs) / 1000);
    } catch (error) {
      console.error("[app] Frame failed.", error);
    }
    if (this.running) {
      this.frameId = this.scheduler.request(this.tick);
    }
  };
}
