// Poise Meter - WebSocket Handler and Express Server
//
// One WebSocket connection = one client. Each connection owns a StreamSampler
// fed by the JPEG frames the client pushes, an optional clip upload for batch
// analysis, and the most recent report for on-demand export.
//
// Frames and samples live in server memory only. Nothing is written to disk
// until the client sends "save_outputs".

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { BatchAnalysisJob } from "./batch-analysis-job.js";
import { errorMessage } from "./errors.js";
import type { FilePersistence } from "./file-persistence.js";
import {
  PushedFrameSource,
  RecordedVideoSource,
  SUPPORTED_VIDEO_EXTENSIONS,
  isSupportedVideoFile,
} from "./frame-sources.js";
import { createLogger, type Logger } from "./logger.js";
import { StreamSampler } from "./stream-sampler.js";
import {
  StreamState,
  type ClientMessage,
  type EmotionClassifier,
  type Report,
  type ScoredSample,
  type ServerMessage,
} from "./types.js";
import { decodeVideoFrame } from "./video-frame-codec.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ExportableResult {
  report: Report;
  samples: ScoredSample[];
}

interface ConnectionState {
  connectionId: string;
  sampler: StreamSampler;
  /** Live inbox of the current stream run; replaced on every start. */
  liveSource: PushedFrameSource | null;
  /** Clip being uploaded; null outside begin_upload … analyze_upload. */
  upload: RecordedVideoSource | null;
  uploadName: string;
  batchRunning: boolean;
  /** Most recent report delivered to the client, batch or stream. */
  lastResult: ExportableResult | null;
  unsubscribe: () => void;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  classifier: EmotionClassifier;
  /** Export target for "save_outputs". Saving is refused when omitted. */
  filePersistence?: FilePersistence | null;
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  logger?: Logger;
  streamIntervalMs?: number;
  windowCapacity?: number;
  batchIntervalSeconds?: number;
  frameWaitTimeoutMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.static(staticDir));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, options, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, options: CreateServerOptions, logger: Logger): void {
  const connectionId = uuidv4();

  const connState: ConnectionState = {
    connectionId,
    sampler: new StreamSampler(
      {
        classifier: options.classifier,
        openLive: async () => {
          const source = new PushedFrameSource({ frameWaitTimeoutMs: options.frameWaitTimeoutMs });
          connState.liveSource = source;
          return source;
        },
      },
      {
        intervalMs: options.streamIntervalMs,
        windowCapacity: options.windowCapacity,
        sessionId: connectionId,
        logger,
      },
    ),
    liveSource: null,
    upload: null,
    uploadName: "",
    batchRunning: false,
    lastResult: null,
    unsubscribe: () => {},
  };

  connState.unsubscribe = connState.sampler.subscribe({
    onSample: ({ sample, window }) => sendMessage(ws, { type: "sample", sample, window }),
    onStateChange: (state) => sendMessage(ws, { type: "stream_state", state }),
    onError: (message) => sendMessage(ws, { type: "error", message, recoverable: true }),
  });

  logger.info(`New WebSocket connection ${connectionId}`);
  sendMessage(ws, { type: "stream_state", state: connState.sampler.currentState });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, logger);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        handleClientMessage(ws, message, connState, options, logger);
      }
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Error handling message for connection ${connectionId}: ${message}`);
      sendMessage(ws, { type: "error", message, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, connection ${connectionId}`);
    cleanupConnection(connState, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for connection ${connectionId}: ${err.message}`);
    cleanupConnection(connState, logger);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Client Message Parsing ─────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate one JSON text frame from the client.
 * @throws Error naming what is wrong with the message
 */
export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error("Client message is not valid JSON.");
  }
  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    throw new Error("Client message must be an object with a string \"type\".");
  }

  switch (parsed.type) {
    case "start_stream":
      return { type: "start_stream" };
    case "stop_stream":
      return { type: "stop_stream" };
    case "reset_stream":
      return { type: "reset_stream" };
    case "generate_report":
      return { type: "generate_report" };
    case "analyze_upload":
      return { type: "analyze_upload" };
    case "save_outputs":
      return { type: "save_outputs" };
    case "begin_upload": {
      const { fps, frameCount, fileName } = parsed;
      if (typeof fps !== "number" || typeof frameCount !== "number") {
        throw new Error("begin_upload requires numeric \"fps\" and \"frameCount\".");
      }
      if (fileName !== undefined && typeof fileName !== "string") {
        throw new Error("begin_upload \"fileName\" must be a string.");
      }
      return fileName === undefined
        ? { type: "begin_upload", fps, frameCount }
        : { type: "begin_upload", fps, frameCount, fileName };
    }
    default:
      throw new Error(`Unknown message type: ${parsed.type}`);
  }
}

// ─── Binary Message Handler (Video Frames) ──────────────────────────────────────

/**
 * Frames go to the clip upload while one is open, otherwise to the live
 * source while streaming, otherwise they are rejected.
 */
function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  logger: Logger,
): void {
  const decoded = decodeVideoFrame(data);
  if (decoded === null) {
    sendMessage(ws, { type: "error", message: "Malformed video frame.", recoverable: true });
    return;
  }

  if (connState.upload !== null) {
    if (!connState.upload.append(decoded.header, decoded.jpegBuffer)) {
      logger.warn(
        `Upload frame seq ${decoded.header.seq} dropped for connection ${connState.connectionId} ` +
          `(out of order or beyond ${connState.upload.frameCount} frames)`,
      );
    }
    return;
  }

  const state = connState.sampler.currentState;
  const streaming = state === StreamState.RUNNING || state === StreamState.RESETTING;
  if (streaming && connState.liveSource !== null) {
    connState.liveSource.push(decoded.jpegBuffer);
    return;
  }

  sendMessage(ws, {
    type: "error",
    message: `Video frame rejected: no upload in progress and stream is "${state}".`,
    recoverable: true,
  });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  options: CreateServerOptions,
  logger: Logger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err) => {
      const text = errorMessage(err);
      logger.error(`Async error for connection ${connState.connectionId}: ${text}`);
      sendMessage(ws, { type: "error", message: text, recoverable: true });
    });
  };

  switch (message.type) {
    case "start_stream":
      catchAsync(connState.sampler.start());
      break;

    case "stop_stream":
      catchAsync(stopStream(connState));
      break;

    case "reset_stream":
      catchAsync(connState.sampler.reset());
      break;

    case "generate_report":
      handleGenerateReport(ws, connState);
      break;

    case "begin_upload":
      handleBeginUpload(ws, message, connState, logger);
      break;

    case "analyze_upload":
      catchAsync(handleAnalyzeUpload(ws, connState, options, logger));
      break;

    case "save_outputs":
      catchAsync(handleSaveOutputs(ws, connState, options, logger));
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Live Stream ────────────────────────────────────────────────────────────────

/** A read blocked on the client's next frame is released rather than waited out. */
async function stopStream(connState: ConnectionState): Promise<void> {
  const stopping = connState.sampler.stop();
  connState.liveSource?.release();
  await stopping;
  connState.liveSource = null;
}

function handleGenerateReport(ws: WebSocket, connState: ConnectionState): void {
  const report = connState.sampler.buildReport();
  connState.lastResult = { report, samples: connState.sampler.getHistory() };
  sendMessage(ws, { type: "report", report });
}

// ─── Clip Upload & Batch Analysis ───────────────────────────────────────────────

function handleBeginUpload(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "begin_upload" }>,
  connState: ConnectionState,
  logger: Logger,
): void {
  if (connState.batchRunning) {
    throw new Error("Cannot begin upload: a batch analysis is already running.");
  }
  const fileName = message.fileName ?? "upload";
  if (message.fileName !== undefined && !isSupportedVideoFile(message.fileName)) {
    throw new Error(
      `Unsupported video format: "${message.fileName}". Supported: ${SUPPORTED_VIDEO_EXTENSIONS.join(", ")}`,
    );
  }

  const upload = new RecordedVideoSource(message.fps, message.frameCount);
  connState.upload?.release();
  connState.upload = upload;
  connState.uploadName = fileName;

  logger.info(
    `Upload started for connection ${connState.connectionId}: ${fileName} ` +
      `(${message.frameCount} frames at ${message.fps} fps)`,
  );
  sendMessage(ws, { type: "log", message: `Receiving ${message.frameCount} frames of ${fileName}...` });
}

async function handleAnalyzeUpload(
  ws: WebSocket,
  connState: ConnectionState,
  options: CreateServerOptions,
  logger: Logger,
): Promise<void> {
  const upload = connState.upload;
  if (upload === null) {
    throw new Error("No upload to analyze. Send begin_upload and the clip's frames first.");
  }
  if (connState.batchRunning) {
    throw new Error("A batch analysis is already running.");
  }

  connState.upload = null;
  connState.batchRunning = true;

  const job = new BatchAnalysisJob(
    {
      openVideo: async () => upload,
      classifier: options.classifier,
      intervalSeconds: options.batchIntervalSeconds,
      logger,
    },
    {
      onProgress: (percentage, message) => sendMessage(ws, { type: "progress", percentage, message }),
      onLog: (message) => sendMessage(ws, { type: "log", message }),
      onComplete: ({ summary, report, chart, extraction }) => {
        connState.lastResult = { report, samples: extraction.samples };
        sendMessage(ws, { type: "analysis_complete", summary, report, chart });
      },
      onError: (message) => sendMessage(ws, { type: "error", message, recoverable: true }),
    },
  );

  try {
    await job.run(connState.uploadName);
  } finally {
    connState.batchRunning = false;
  }
}

// ─── Save Outputs ───────────────────────────────────────────────────────────────

async function handleSaveOutputs(
  ws: WebSocket,
  connState: ConnectionState,
  options: CreateServerOptions,
  logger: Logger,
): Promise<void> {
  const result = connState.lastResult;
  if (result === null) {
    throw new Error("No analysis results available to save.");
  }
  const persistence = options.filePersistence ?? null;
  if (persistence === null) {
    throw new Error("No file persistence engine configured.");
  }

  const status = await persistence.saveAll(result.report, result.samples);
  if (status.ok) {
    logger.info(`Outputs saved for connection ${connState.connectionId}: ${status.paths.join(", ")}`);
    sendMessage(ws, { type: "outputs_saved", paths: status.paths });
  } else {
    sendMessage(ws, { type: "export_failed", message: status.message });
  }
}

// ─── Messaging ──────────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(connState: ConnectionState, logger: Logger): void {
  connState.unsubscribe();
  connState.upload?.release();
  connState.upload = null;

  stopStream(connState)
    .then(() => connState.sampler.dispose())
    .catch((err) => {
      logger.error(`Failed to stop stream for connection ${connState.connectionId}: ${errorMessage(err)}`);
    });
}

export type { ConnectionState };
