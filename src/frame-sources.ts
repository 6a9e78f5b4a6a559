// Poise Meter - Frame sources fed over the WebSocket
//
// RecordedVideoSource: a clip uploaded frame by frame, seekable by time.
// PushedFrameSource: a live camera whose frames the client pushes as they are
// captured; read() hands out the newest unread frame.

import { FrameReadError, SourceUnavailableError } from "./errors.js";
import { RingBuffer } from "./ring-buffer.js";
import type { FrameHeader, LiveSource, VideoSource } from "./types.js";

/** Container extensions accepted for uploaded clips. */
export const SUPPORTED_VIDEO_EXTENSIONS = [".mp4", ".avi", ".mov", ".mkv", ".wmv", ".flv", ".webm"] as const;

export function isSupportedVideoFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SUPPORTED_VIDEO_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

// ─── Recorded Clip ──────────────────────────────────────────────────────────────

export class RecordedVideoSource implements VideoSource {
  /** Whole frames per second; a fractional rate such as 29.97 is truncated. */
  readonly fps: number;
  private readonly declaredFrameCount: number;
  /** Indexed by frame position (header seq); holes are frames the client never sent. */
  private frames: Array<Buffer | undefined>;
  private received: number;
  private lastSeq: number;
  private released: boolean;

  constructor(fps: number, frameCount: number) {
    const wholeFps = Math.trunc(fps);
    if (!Number.isFinite(fps) || wholeFps <= 0) {
      throw new SourceUnavailableError(`Invalid fps: ${fps}. Must be at least 1.`);
    }
    if (!Number.isInteger(frameCount) || frameCount < 0) {
      throw new SourceUnavailableError(`Invalid frameCount: ${frameCount}. Must be a non-negative integer.`);
    }
    this.fps = wholeFps;
    this.declaredFrameCount = frameCount;
    this.frames = [];
    this.received = 0;
    this.lastSeq = -1;
    this.released = false;
  }

  /** Declared length of the clip, as reported when the upload began. */
  get frameCount(): number {
    return this.declaredFrameCount;
  }

  get receivedFrames(): number {
    return this.received;
  }

  /**
   * Store a frame at its position in the clip.
   * Returns false (and ignores the frame) on seq regression or a seq outside the declared length.
   */
  append(header: FrameHeader, jpegBuffer: Buffer): boolean {
    if (this.released) return false;
    if (header.seq <= this.lastSeq) return false;
    if (header.seq >= this.declaredFrameCount) return false;

    this.lastSeq = header.seq;
    this.frames[header.seq] = jpegBuffer;
    this.received++;
    return true;
  }

  /**
   * Frame at position round(t * fps), or the nearest received frame when that
   * one is missing (ties go to the earlier frame). Null past the last
   * received frame.
   */
  async seekAndRead(timeSeconds: number): Promise<Buffer | null> {
    if (this.released) {
      throw new FrameReadError("Video source has been released");
    }
    const index = Math.round(timeSeconds * this.fps);
    if (index < 0) {
      throw new FrameReadError(`Cannot seek to negative time ${timeSeconds}s`);
    }
    if (index > this.lastSeq) return null;

    for (let offset = 0; offset <= this.lastSeq; offset++) {
      const before = this.frames[index - offset];
      if (before !== undefined) return before;
      const after = this.frames[index + offset];
      if (after !== undefined) return after;
    }
    return null;
  }

  release(): void {
    this.released = true;
    this.frames = [];
  }
}

// ─── Live Pushed Frames ─────────────────────────────────────────────────────────

interface PendingRead {
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface PushedFrameSourceOptions {
  /** How long read() waits for the client to deliver a frame. Default: 5000 ms. */
  frameWaitTimeoutMs?: number;
  /** Unread frames kept before the oldest are dropped. Default: 5. */
  inboxSize?: number;
}

export class PushedFrameSource implements LiveSource {
  private readonly inbox: RingBuffer<Buffer>;
  private readonly frameWaitTimeoutMs: number;
  private pending: PendingRead | null;
  private released: boolean;

  constructor(options: PushedFrameSourceOptions = {}) {
    this.inbox = new RingBuffer<Buffer>(options.inboxSize ?? 5);
    this.frameWaitTimeoutMs = options.frameWaitTimeoutMs ?? 5000;
    this.pending = null;
    this.released = false;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Frames superseded before anyone read them. */
  get framesDropped(): number {
    return this.inbox.evictedCount;
  }

  push(jpegBuffer: Buffer): void {
    if (this.released) return;

    const waiter = this.pending;
    if (waiter !== null) {
      this.pending = null;
      clearTimeout(waiter.timer);
      waiter.resolve(jpegBuffer);
      return;
    }
    this.inbox.push(jpegBuffer);
  }

  /**
   * Newest unread frame; older unread frames are discarded. Waits for the
   * next push when nothing is unread.
   * @throws FrameReadError on timeout, on release, or when a read is already pending
   */
  read(): Promise<Buffer> {
    if (this.released) {
      return Promise.reject(new FrameReadError("Live source has been released"));
    }
    if (this.pending !== null) {
      return Promise.reject(new FrameReadError("A frame read is already pending"));
    }

    const newest = this.inbox.peekNewest();
    if (newest !== undefined) {
      this.inbox.clear();
      return Promise.resolve(newest);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new FrameReadError(`No frame received within ${this.frameWaitTimeoutMs}ms`));
      }, this.frameWaitTimeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.inbox.clear();

    const waiter = this.pending;
    if (waiter !== null) {
      this.pending = null;
      clearTimeout(waiter.timer);
      waiter.reject(new FrameReadError("Live source has been released"));
    }
  }
}
