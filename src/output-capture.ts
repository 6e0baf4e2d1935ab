import { CaptureImbalanceError } from './errors.js';
import type { OutputSink } from './types.js';

/**
 * Handle returned by {@link OutputCapture.open}. Only the capture that issued
 * it can close it.
 */
export interface FrameHandle {
  readonly id: number;
  readonly depth: number;
}

interface OutputFrame {
  handle: FrameHandle;
  chunks: string[];
}

/**
 * Stack of output buffers.
 *
 * Text written while at least one frame is open goes to the innermost frame
 * only; with no open frame it goes straight to the sink. Frames are strictly
 * LIFO.
 */
export class OutputCapture {
  private readonly frames: OutputFrame[] = [];
  private nextId = 1;

  constructor (private readonly sink: OutputSink) {}

  /**
   * Number of currently open frames.
   */
  get depth (): number {
    return this.frames.length;
  }

  /**
   * Push a new frame. It receives all text until it is closed.
   */
  open (): FrameHandle {
    const handle: FrameHandle = Object.freeze({ id: this.nextId++, depth: this.frames.length + 1 });
    this.frames.push({ handle, chunks: [] });
    return handle;
  }

  /**
   * Pop the innermost frame and return its text.
   *
   * @param handle - Handle of the innermost frame.
   * @throws CaptureImbalanceError if `handle` is not the innermost open frame.
   */
  close (handle: FrameHandle): string {
    const top = this.frames[this.frames.length - 1];
    if (!top) {
      throw new CaptureImbalanceError(`Cannot close frame #${handle.id}: no frame is open`, 0);
    }
    if (top.handle !== handle) {
      throw new CaptureImbalanceError(
        `Cannot close frame #${handle.id}: frame #${top.handle.id} is still open`,
        this.frames.length,
      );
    }
    this.frames.pop();
    return top.chunks.join('');
  }

  /**
   * Append text to the innermost frame, or to the sink if none is open.
   */
  write (text: string): void {
    if (text.length === 0) return;
    const top = this.frames[this.frames.length - 1];
    if (top) {
      top.chunks.push(text);
    } else {
      this.sink.write(text);
    }
  }

  /**
   * Run `fn` inside a fresh frame and return what it wrote.
   *
   * The frame is released on every exit path. A failure thrown by `fn`
   * propagates unchanged and its partial output is discarded.
   */
  capture (fn: () => void): string {
    const handle = this.open();
    try {
      fn();
    } catch (err) {
      this.unwind(handle);
      throw err;
    }
    return this.close(handle);
  }

  /**
   * Drop `handle` and every frame opened above it. Used on failure paths,
   * where the original error matters more than the frames' text.
   */
  private unwind (handle: FrameHandle): void {
    const idx = this.frames.findIndex((f) => f.handle === handle);
    if (idx !== -1) this.frames.length = idx;
  }
}
