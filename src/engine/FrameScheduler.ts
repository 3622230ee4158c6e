// FrameScheduler — owns the requestAnimationFrame loop and the resize hook.
//
// One callback serves both triggers and is told which one fired:
//   callback(true)  — the surface may have changed size; recompute viewport,
//                     projection and anything else layout-dependent.
//   callback(false) — an ordinary animation step.
//
// start() runs callback(true) once synchronously, before anything is
// registered, then hands control back to the host. From there every animation
// frame runs callback(false) and re-requests the next one, and every resize runs
// callback(true). There is no stop: the loop lives as long as the page.

import { SchedulerInitError } from "./errors";

export type FrameCallback = (surfaceChanged: boolean) => void;
export type SchedulerState = "idle" | "running" | "failed";

/** The platform's two event sources, both delivered on the UI thread. */
export interface FrameHost {
  /** One-shot notification before the next display refresh. */
  requestFrame(callback: (time: number) => void): void;
  /** Notification whenever the output surface changes size. */
  onResize(listener: () => void): void;
}

/** A FrameHost over window's requestAnimationFrame and "resize" event. */
export function browserFrameHost(): FrameHost {
  if (typeof globalThis.requestAnimationFrame !== "function") {
    throw new SchedulerInitError("requestAnimationFrame is not available");
  }
  if (typeof globalThis.addEventListener !== "function") {
    throw new SchedulerInitError("window resize events are not available");
  }
  return {
    requestFrame: (callback) => {
      globalThis.requestAnimationFrame(callback);
    },
    onResize: (listener) => {
      globalThis.addEventListener("resize", listener);
    },
  };
}

export class FrameScheduler {
  private host: FrameHost | null;
  private callback: FrameCallback | null = null;
  private _state: SchedulerState = "idle";
  private _frameCount = 0;

  // A resize that lands while the callback is running (only possible with a
  // host that dispatches synchronously) waits for it to return.
  private inFlight = false;
  private resizePending = false;

  /** Uses the browser window when no host is given. */
  constructor(host?: FrameHost) {
    this.host = host ?? null;
  }

  get state(): SchedulerState {
    return this._state;
  }

  /** Animation frames delivered so far; layout passes are not counted. */
  get frameCount(): number {
    return this._frameCount;
  }

  start(callback: FrameCallback): void {
    if (this._state !== "idle") {
      throw new SchedulerInitError(`Scheduler already started (${this._state})`);
    }
    const host = (this.host ??= browserFrameHost());

    this.callback = callback;
    this._state = "running";
    this.run(true);

    try {
      host.requestFrame(this.onFrame);
      host.onResize(this.onResize);
    } catch (err) {
      this._state = "failed";
      throw new SchedulerInitError("Failed to register frame callbacks", { cause: err });
    }
  }

  private readonly onFrame = (): void => {
    const host = this.host;
    if (this._state !== "running" || !host) return;
    this._frameCount++;
    this.run(false);
    host.requestFrame(this.onFrame);
  };

  private readonly onResize = (): void => {
    if (this._state !== "running") return;
    if (this.inFlight) {
      this.resizePending = true;
      return;
    }
    this.run(true);
  };

  private run(surfaceChanged: boolean): void {
    const callback = this.callback;
    if (!callback) return;

    this.inFlight = true;
    try {
      callback(surfaceChanged);
      while (this.resizePending) {
        this.resizePending = false;
        callback(true);
      }
    } catch (err) {
      this._state = "failed";
      this.resizePending = false;
      console.error("[retained-gl] Frame callback threw; the render loop has stopped.", err);
      throw err;
    } finally {
      this.inFlight = false;
    }
  }
}
