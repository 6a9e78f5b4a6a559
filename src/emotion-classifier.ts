// Poise Meter - Emotion classifier boundary
//
// The classifier model runs outside this process. HttpEmotionClassifier posts
// one JPEG per call and expects a probability vector back, either bare, as
// { emotion: {...} }, or as a list of such results (one per detected face).
// Frames without a detectable face are the service's problem: it is expected
// to answer with a best-effort vector rather than an error.

import { ClassificationError, errorMessage } from "./errors.js";
import { completeEmotionVector } from "./score-calculator.js";
import {
  isEmotionLabel,
  type ClassifierResult,
  type EmotionClassifier,
  type EmotionLabel,
  type EmotionVector,
} from "./types.js";

/** Request timeout in ms */
const DEFAULT_TIMEOUT_MS = 5000;

// ─── Result Helpers ─────────────────────────────────────────────────────────────

/**
 * First face of a classifier result.
 * @throws ClassificationError when the classifier reports an empty face list.
 */
export function firstFace(result: ClassifierResult): EmotionVector {
  if (!Array.isArray(result)) return result;
  const [first] = result;
  if (first === undefined) {
    throw new ClassificationError("Classifier returned an empty face list");
  }
  return first;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate one face entry. Unknown keys are ignored, missing labels read as 0,
 * and every known label present must be a finite number in [0, 100].
 */
function parseEmotionVector(entry: unknown): EmotionVector {
  if (!isRecord(entry)) {
    throw new ClassificationError("Classifier face entry is not an object");
  }
  const scores = isRecord(entry.emotion) ? entry.emotion : entry;

  const parsed: Partial<Record<EmotionLabel, number>> = {};
  let known = 0;
  for (const [key, value] of Object.entries(scores)) {
    if (!isEmotionLabel(key)) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
      throw new ClassificationError(`Classifier returned an invalid probability for "${key}": ${String(value)}`);
    }
    parsed[key] = value;
    known++;
  }

  if (known === 0) {
    throw new ClassificationError("Classifier response contains no known emotion labels");
  }
  return completeEmotionVector(parsed);
}

/** Validate a decoded classifier response body. */
export function parseClassifierResponse(body: unknown): ClassifierResult {
  if (Array.isArray(body)) {
    return body.map(parseEmotionVector);
  }
  return parseEmotionVector(body);
}

// ─── HTTP Classifier ────────────────────────────────────────────────────────────

export interface HttpEmotionClassifierOptions {
  url: string;
  timeoutMs?: number;
  /** Injected by tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export class HttpEmotionClassifier implements EmotionClassifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEmotionClassifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * POST the JPEG frame and validate the answer.
   * @throws ClassificationError on transport failure, timeout, non-2xx status or malformed body.
   */
  async classify(frame: Buffer): Promise<ClassifierResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "image/jpeg" },
        body: new Uint8Array(frame),
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      throw new ClassificationError(`Classifier request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new ClassificationError(`Classifier responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ClassificationError("Classifier response is not valid JSON", { cause: err });
    }

    return parseClassifierResponse(body);
  }
}
