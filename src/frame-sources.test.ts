/**
 * Unit tests for frame-sources.ts
 */

import { describe, it, expect } from "vitest";
import { FrameReadError, SourceUnavailableError } from "./errors.js";
import { PushedFrameSource, RecordedVideoSource, isSupportedVideoFile } from "./frame-sources.js";
import type { FrameHeader } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeHeader(seq: number): FrameHeader {
  return { timestamp: seq * 0.1, seq, width: 640, height: 480 };
}

function makeJpeg(id: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeUInt32BE(id, 0);
  return buf;
}

// ─── Supported Formats ──────────────────────────────────────────────────────────

describe("isSupportedVideoFile", () => {
  it("accepts the supported containers case-insensitively", () => {
    for (const name of ["talk.mp4", "talk.AVI", "a.b.mov", "x.mkv", "x.wmv", "x.flv", "x.webm"]) {
      expect(isSupportedVideoFile(name)).toBe(true);
    }
  });

  it("rejects anything else", () => {
    expect(isSupportedVideoFile("notes.txt")).toBe(false);
    expect(isSupportedVideoFile("mp4")).toBe(false);
    expect(isSupportedVideoFile("clip.mp4.zip")).toBe(false);
  });
});

// ─── RecordedVideoSource ────────────────────────────────────────────────────────

describe("RecordedVideoSource", () => {
  function loaded(fps: number, frameCount: number): RecordedVideoSource {
    const source = new RecordedVideoSource(fps, frameCount);
    for (let seq = 0; seq < frameCount; seq++) source.append(makeHeader(seq), makeJpeg(seq));
    return source;
  }

  it("rejects an unusable frame rate or frame count", () => {
    expect(() => new RecordedVideoSource(0, 10)).toThrow(SourceUnavailableError);
    expect(() => new RecordedVideoSource(Number.NaN, 10)).toThrow("Invalid fps");
    expect(() => new RecordedVideoSource(30, -1)).toThrow("Invalid frameCount: -1");
    expect(() => new RecordedVideoSource(30, 2.5)).toThrow(SourceUnavailableError);
  });

  it("seeks to the frame nearest the requested time", async () => {
    const source = loaded(10, 5);

    expect(await source.seekAndRead(0)).toEqual(makeJpeg(0));
    expect(await source.seekAndRead(0.2)).toEqual(makeJpeg(2));
    expect(await source.seekAndRead(0.44)).toEqual(makeJpeg(4));
  });

  it("reports end of stream past the received frames", async () => {
    const source = loaded(10, 5);
    expect(await source.seekAndRead(1)).toBeNull();
  });

  it("ignores repeated or out-of-order frames and frames beyond the declared length", () => {
    const source = new RecordedVideoSource(30, 3);

    expect(source.append(makeHeader(0), makeJpeg(0))).toBe(true);
    expect(source.append(makeHeader(0), makeJpeg(0))).toBe(false);
    expect(source.append(makeHeader(3), makeJpeg(3))).toBe(false);
    expect(source.append(makeHeader(2), makeJpeg(2))).toBe(true);
    expect(source.append(makeHeader(1), makeJpeg(1))).toBe(false);
    expect(source.receivedFrames).toBe(2);
    expect(source.frameCount).toBe(3);
  });

  it("keeps seeks aligned with clip time when frames are missing", async () => {
    const source = new RecordedVideoSource(10, 30);
    for (let seq = 0; seq < 30; seq += 2) source.append(makeHeader(seq), makeJpeg(seq));

    expect(source.receivedFrames).toBe(15);
    expect(await source.seekAndRead(1)).toEqual(makeJpeg(10));
    expect(await source.seekAndRead(2)).toEqual(makeJpeg(20));
    // Frame 1 was skipped: frames 0 and 2 are equally near, the earlier wins.
    expect(await source.seekAndRead(0.1)).toEqual(makeJpeg(0));
    expect(await source.seekAndRead(2.5)).toEqual(makeJpeg(24));
    expect(await source.seekAndRead(2.9)).toBeNull();
  });

  it("truncates a fractional frame rate", () => {
    const source = new RecordedVideoSource(29.97, 90);
    expect(source.fps).toBe(29);
    expect(() => new RecordedVideoSource(0.5, 10)).toThrow("Invalid fps: 0.5. Must be at least 1.");
  });

  it("fails reads after release", async () => {
    const source = loaded(10, 3);
    source.release();

    await expect(source.seekAndRead(0)).rejects.toBeInstanceOf(FrameReadError);
    expect(source.append(makeHeader(9), makeJpeg(9))).toBe(false);
  });

  it("fails a negative seek", async () => {
    await expect(loaded(10, 3).seekAndRead(-1)).rejects.toThrow("Cannot seek to negative time -1s");
  });
});

// ─── PushedFrameSource ──────────────────────────────────────────────────────────

describe("PushedFrameSource", () => {
  it("hands out the newest unread frame and discards older ones", async () => {
    const source = new PushedFrameSource();
    source.push(makeJpeg(1));
    source.push(makeJpeg(2));

    expect(await source.read()).toEqual(makeJpeg(2));

    source.push(makeJpeg(3));
    expect(await source.read()).toEqual(makeJpeg(3));
  });

  it("waits for the next push when nothing is unread", async () => {
    const source = new PushedFrameSource();
    const pending = source.read();
    source.push(makeJpeg(42));

    await expect(pending).resolves.toEqual(makeJpeg(42));
  });

  it("counts frames dropped from a full inbox", () => {
    const source = new PushedFrameSource({ inboxSize: 5 });
    for (let i = 0; i < 7; i++) source.push(makeJpeg(i));
    expect(source.framesDropped).toBe(2);
  });

  it("times out when no frame arrives", async () => {
    const source = new PushedFrameSource({ frameWaitTimeoutMs: 20 });
    await expect(source.read()).rejects.toThrow("No frame received within 20ms");
  });

  it("allows only one pending read", async () => {
    const source = new PushedFrameSource({ frameWaitTimeoutMs: 60_000 });
    const first = source.read();

    await expect(source.read()).rejects.toThrow("A frame read is already pending");

    source.release();
    await expect(first).rejects.toThrow("Live source has been released");
  });

  it("rejects reads and ignores pushes after release", async () => {
    const source = new PushedFrameSource();
    source.release();
    source.push(makeJpeg(1));

    expect(source.isReleased).toBe(true);
    await expect(source.read()).rejects.toBeInstanceOf(FrameReadError);
  });
});
