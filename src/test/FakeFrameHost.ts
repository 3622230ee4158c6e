import type { FrameHost } from "../engine";

/** A frame host driven by hand: tick() delivers frames, resize() fires resizes. */
export class FakeFrameHost implements FrameHost {
  pending: ((time: number) => void)[] = [];
  readonly resizeListeners: (() => void)[] = [];

  requestFrame(callback: (time: number) => void): void {
    this.pending.push(callback);
  }

  onResize(listener: () => void): void {
    this.resizeListeners.push(listener);
  }

  /** Runs the frame callbacks requested so far; ones requested meanwhile wait for the next tick. */
  tick(time = 16): void {
    const due = this.pending;
    this.pending = [];
    for (const callback of due) callback(time);
  }

  resize(): void {
    for (const listener of this.resizeListeners) listener();
  }
}
