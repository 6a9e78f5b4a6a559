// Poise Meter - Entry point
// Wires the classifier, exporter and server together and starts listening.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { loadConfig, type AppConfig } from "./config.js";
import { HttpEmotionClassifier } from "./emotion-classifier.js";
import { errorMessage } from "./errors.js";
import { FilePersistence } from "./file-persistence.js";
import { createAppServer, type AppServer } from "./server.js";

export const APP_NAME = "Poise Meter";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<AppServer | null> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    logFatal(errorMessage(err));
    return null;
  }

  if (config.classifierUrl === null) {
    logFatal("CLASSIFIER_URL is not set. Add it to your .env file.");
    return null;
  }

  logInit(`Creating emotion classifier client (${config.classifierUrl}, ${config.classifierTimeoutMs}ms timeout)...`);
  const classifier = new HttpEmotionClassifier({
    url: config.classifierUrl,
    timeoutMs: config.classifierTimeoutMs,
  });

  logInit(`Initializing FilePersistence (${config.outputDir}/)...`);
  const filePersistence = new FilePersistence(config.outputDir);

  const server = createAppServer({
    classifier,
    filePersistence,
    streamIntervalMs: config.streamIntervalMs,
    windowCapacity: config.windowCapacity,
    batchIntervalSeconds: config.batchIntervalSeconds,
    frameWaitTimeoutMs: config.frameWaitTimeoutMs,
  });

  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit(
    `Live: ${config.streamIntervalMs}ms cadence, ${config.windowCapacity}-sample window. ` +
      `Batch: one sample every ${config.batchIntervalSeconds}s of video`,
  );
  logInit("Ready for connections");
  return server;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main()
    .then((server) => {
      if (server === null) process.exit(1);
    })
    .catch((err) => {
      logFatal(errorMessage(err));
      process.exit(1);
    });
}
