/**
 * Binary frame codec for PM-prefixed wire format.
 *
 * Wire format: [0x50 0x4D magic ("PM")][type byte 0x56][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][JPEG bytes]
 *
 * Both uploaded clip frames and live camera frames use this one format;
 * the server decides where a frame goes from the connection's state.
 */

import type { FrameHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const PM_MAGIC_0 = 0x50; // 'P'
const PM_MAGIC_1 = 0x4d; // 'M'
const TYPE_VIDEO = 0x56; // 'V'

/** 2 (magic) + 1 (type) + 3 (header len) */
const PREFIX_SIZE = 6;

const MAX_HEADER_JSON_BYTES = 4096;

/** 2 MB */
const MAX_JPEG_PAYLOAD_BYTES = 2 * 1024 * 1024;

const MAX_WIDTH = 1920;
const MAX_HEIGHT = 1080;

export interface DecodedVideoFrame {
  header: FrameHeader;
  jpegBuffer: Buffer;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

export function encodeVideoFrame(header: FrameHeader, jpegBuffer: Buffer): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const buf = Buffer.alloc(PREFIX_SIZE + headerJson.length + jpegBuffer.length);

  buf[0] = PM_MAGIC_0;
  buf[1] = PM_MAGIC_1;
  buf[2] = TYPE_VIDEO;
  buf.writeUIntBE(headerJson.length, 3, 3);

  headerJson.copy(buf, PREFIX_SIZE);
  jpegBuffer.copy(buf, PREFIX_SIZE + headerJson.length);
  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

function isValidFrameHeader(obj: unknown): obj is FrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  if (!("timestamp" in obj && "seq" in obj && "width" in obj && "height" in obj)) return false;

  const { timestamp, seq, width, height } = obj;
  if (typeof timestamp !== "number" || !Number.isFinite(timestamp) || timestamp < 0) return false;
  return isNonNegativeInteger(seq) && isPositiveInteger(width) && isPositiveInteger(height);
}

/**
 * Decode a video frame from the PM-prefixed wire format.
 * Returns null on malformed input, oversized headers, payloads or resolutions.
 */
export function decodeVideoFrame(data: Buffer): DecodedVideoFrame | null {
  if (!isVideoFrame(data) || data.length < PREFIX_SIZE) return null;

  const headerLen = data.readUIntBE(3, 3);
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < PREFIX_SIZE + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", PREFIX_SIZE, PREFIX_SIZE + headerLen));
  } catch {
    return null;
  }

  if (!isValidFrameHeader(header)) return null;
  if (header.width > MAX_WIDTH || header.height > MAX_HEIGHT) return null;

  const jpegBuffer = data.subarray(PREFIX_SIZE + headerLen);
  if (jpegBuffer.length > MAX_JPEG_PAYLOAD_BYTES) return null;

  return {
    header: { timestamp: header.timestamp, seq: header.seq, width: header.width, height: header.height },
    jpegBuffer,
  };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/** Checks magic prefix 0x50 0x4D and type byte 0x56. */
export function isVideoFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === PM_MAGIC_0 && data[1] === PM_MAGIC_1 && data[2] === TYPE_VIDEO;
}
