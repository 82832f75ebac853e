import * as Comlink from "comlink";

import { computeChunk } from "./compute-chunk.js";
import type { ChunkComputeRequest } from "./types.js";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
export const workerAPI = {
  /**
   * Computes a fractal chunk and returns the pixel data.
   */
  computeChunk: (request: ChunkComputeRequest) => {
    return computeChunk(request);
  },

  /**
   * Simple ping method for testing worker connectivity.
   * @returns "pong" string
   */
  ping: () => "pong" as const,
};

export type FractalWorkerAPI = typeof workerAPI;

export function exposeFractalWorker(endpoint: Comlink.Endpoint): void {
  Comlink.expose(workerAPI, endpoint);
}
