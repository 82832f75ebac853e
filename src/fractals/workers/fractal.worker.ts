// ABOUTME: Worker thread entry point for parallel fractal computation using Comlink RPC
// ABOUTME: Exposes the worker API on parentPort for the main thread to call

import { parentPort } from "node:worker_threads";

import { nodeEndpoint } from "./node-endpoint.js";
import { exposeFractalWorker } from "./worker-api.js";

if (!parentPort) {
  throw new Error("fractal.worker must be started as a worker thread");
}

exposeFractalWorker(nodeEndpoint(parentPort));
