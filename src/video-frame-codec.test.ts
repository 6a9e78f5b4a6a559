/**
 * Unit tests for video-frame-codec.ts
 */

import { describe, it, expect } from "vitest";
import { decodeVideoFrame, encodeVideoFrame, isVideoFrame } from "./video-frame-codec.js";
import type { FrameHeader } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeHeader(overrides?: Partial<FrameHeader>): FrameHeader {
  return { timestamp: 1.5, seq: 0, width: 640, height: 480, ...overrides };
}

/** Create a fake JPEG buffer of given size */
function makeJpeg(size = 100): Buffer {
  return Buffer.alloc(size, 0xff);
}

/** Hand-assemble a frame around arbitrary header text. */
function rawFrame(headerText: string, payload: Buffer = makeJpeg(4), typeByte = 0x56): Buffer {
  const headerBytes = Buffer.from(headerText, "utf-8");
  const prefix = Buffer.from([0x50, 0x4d, typeByte, 0, 0, 0]);
  prefix.writeUIntBE(headerBytes.length, 3, 3);
  return Buffer.concat([prefix, headerBytes, payload]);
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

describe("encodeVideoFrame", () => {
  it("writes magic, type byte, uint24 header length, header JSON and payload", () => {
    const header = makeHeader();
    const json = JSON.stringify(header);
    const encoded = encodeVideoFrame(header, Buffer.from([1, 2, 3]));

    expect([...encoded.subarray(0, 3)]).toEqual([0x50, 0x4d, 0x56]);
    expect(encoded.readUIntBE(3, 3)).toBe(json.length);
    expect(encoded.toString("utf-8", 6, 6 + json.length)).toBe(json);
    expect([...encoded.subarray(6 + json.length)]).toEqual([1, 2, 3]);
  });
});

// ─── Decode ─────────────────────────────────────────────────────────────────────

describe("decodeVideoFrame", () => {
  it("decodes what encodeVideoFrame produced", () => {
    const header = makeHeader({ seq: 7, width: 1920, height: 1080 });
    const jpeg = makeJpeg(64);

    expect(decodeVideoFrame(encodeVideoFrame(header, jpeg))).toEqual({ header, jpegBuffer: jpeg });
  });

  it("accepts an empty payload", () => {
    const decoded = decodeVideoFrame(encodeVideoFrame(makeHeader(), Buffer.alloc(0)));
    expect(decoded?.jpegBuffer.length).toBe(0);
  });

  it("drops header fields it does not know", () => {
    const decoded = decodeVideoFrame(rawFrame('{"timestamp":0,"seq":0,"width":10,"height":10,"camera":"front"}'));
    expect(decoded?.header).toEqual({ timestamp: 0, seq: 0, width: 10, height: 10 });
  });

  it("returns null for buffers that are too short or lack the magic", () => {
    expect(decodeVideoFrame(Buffer.alloc(0))).toBeNull();
    expect(decodeVideoFrame(Buffer.from([0x50, 0x4d, 0x56, 0]))).toBeNull();
    expect(decodeVideoFrame(Buffer.from([0x54, 0x4d, 0x56, 0, 0, 2, 0x7b, 0x7d]))).toBeNull();
  });

  it("returns null for a foreign type byte", () => {
    expect(decodeVideoFrame(rawFrame(JSON.stringify(makeHeader()), makeJpeg(4), 0x41))).toBeNull();
  });

  it("returns null for a zero, truncated or oversized header length", () => {
    expect(decodeVideoFrame(Buffer.from([0x50, 0x4d, 0x56, 0, 0, 0]))).toBeNull();
    expect(decodeVideoFrame(Buffer.from([0x50, 0x4d, 0x56, 0, 0, 50, 0x7b]))).toBeNull();

    const padded = JSON.stringify({ ...makeHeader(), note: "x".repeat(5000) });
    expect(decodeVideoFrame(rawFrame(padded))).toBeNull();
  });

  it("returns null for header text that is not JSON", () => {
    expect(decodeVideoFrame(rawFrame("{not json"))).toBeNull();
  });

  it("returns null for invalid header fields", () => {
    const invalid: Array<Record<string, unknown>> = [
      { ...makeHeader(), timestamp: -1 },
      { ...makeHeader(), seq: -1 },
      { ...makeHeader(), seq: 1.5 },
      { ...makeHeader(), width: 0 },
      { ...makeHeader(), height: 0 },
      { ...makeHeader(), width: 640.5 },
      { timestamp: 0, width: 640, height: 480 },
    ];
    for (const header of invalid) {
      expect(decodeVideoFrame(rawFrame(JSON.stringify(header)))).toBeNull();
    }
  });

  it("returns null above 1920x1080", () => {
    expect(decodeVideoFrame(encodeVideoFrame(makeHeader({ width: 1921 }), makeJpeg()))).toBeNull();
    expect(decodeVideoFrame(encodeVideoFrame(makeHeader({ height: 1081 }), makeJpeg()))).toBeNull();
  });

  it("returns null for a payload above 2 MB", () => {
    expect(decodeVideoFrame(encodeVideoFrame(makeHeader(), makeJpeg(2 * 1024 * 1024 + 1)))).toBeNull();
  });
});

// ─── Inspection ─────────────────────────────────────────────────────────────────

describe("isVideoFrame", () => {
  it("checks the magic prefix and type byte only", () => {
    expect(isVideoFrame(encodeVideoFrame(makeHeader(), makeJpeg()))).toBe(true);
    expect(isVideoFrame(Buffer.from([0x50, 0x4d, 0x56]))).toBe(true);
    expect(isVideoFrame(Buffer.from([0x50, 0x4d]))).toBe(false);
    expect(isVideoFrame(Buffer.from([0x50, 0x4d, 0x41]))).toBe(false);
    expect(isVideoFrame(Buffer.alloc(0))).toBe(false);
  });
});
