// Poise Meter - Environment configuration
// The entry point loads .env through dotenv before calling loadConfig().

export interface AppConfig {
  port: number;
  /** Endpoint of the external emotion classifier. Null when unset. */
  classifierUrl: string | null;
  classifierTimeoutMs: number;
  outputDir: string;
  /** Sleep between live sampling iterations (~2 samples/second). */
  streamIntervalMs: number;
  /** Sliding window capacity for live display. */
  windowCapacity: number;
  /** Spacing of batch samples in clip time. */
  batchIntervalSeconds: number;
  /** How long a live read waits for the client to deliver a frame. */
  frameWaitTimeoutMs: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  classifierUrl: null,
  classifierTimeoutMs: 5000,
  outputDir: "output",
  streamIntervalMs: 500,
  windowCapacity: 60,
  batchIntervalSeconds: 1,
  frameWaitTimeoutMs: 5000,
};

function readPositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { integer }: { integer: boolean },
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new Error(
      `Invalid ${name}: "${raw}". Expected a positive ${integer ? "integer" : "number"}.`,
    );
  }
  return value;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const classifierUrl = env.CLASSIFIER_URL?.trim() || null;
  if (classifierUrl !== null && !isHttpUrl(classifierUrl)) {
    throw new Error(`Invalid CLASSIFIER_URL: "${classifierUrl}" is not an http(s) URL.`);
  }

  return {
    port: readPositiveNumber(env, "PORT", DEFAULT_CONFIG.port, { integer: true }),
    classifierUrl,
    classifierTimeoutMs: readPositiveNumber(env, "CLASSIFIER_TIMEOUT_MS", DEFAULT_CONFIG.classifierTimeoutMs, { integer: true }),
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_CONFIG.outputDir,
    streamIntervalMs: readPositiveNumber(env, "STREAM_INTERVAL_MS", DEFAULT_CONFIG.streamIntervalMs, { integer: true }),
    windowCapacity: readPositiveNumber(env, "WINDOW_CAPACITY", DEFAULT_CONFIG.windowCapacity, { integer: true }),
    batchIntervalSeconds: readPositiveNumber(env, "BATCH_INTERVAL_SECONDS", DEFAULT_CONFIG.batchIntervalSeconds, { integer: false }),
    frameWaitTimeoutMs: readPositiveNumber(env, "FRAME_WAIT_TIMEOUT_MS", DEFAULT_CONFIG.frameWaitTimeoutMs, { integer: true }),
  };
}
