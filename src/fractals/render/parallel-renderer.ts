// ABOUTME: Orchestrates parallel fractal rendering using worker threads
// ABOUTME: Manages the worker pool and distributes disjoint chunks of the raster

import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";

import * as Comlink from "comlink";

import { PerformanceMonitor } from "../../lib/performance-monitor.js";
import { requirePositiveInteger } from "../../lib/validation.js";
import type { Palette } from "../coloring/palette.js";
import type { FractalParams, OutputRaster, RasterDimensions, Viewport } from "../types.js";
import { nodeEndpoint } from "../workers/node-endpoint.js";
import { type ChunkComputeRequest, type ChunkComputeResult, serializeViewport } from "../workers/types.js";
import type { FractalWorkerAPI } from "../workers/worker-api.js";
import { type ChunkOptions, createChunks, DEFAULT_CHUNK_OPTIONS, type RenderChunk } from "./chunks.js";
import { blitChunk, createRaster, createRenderPipeline } from "./pipeline.js";

/**
 * Options for controlling render behavior
 */
export interface RenderOptions {
  /** Callback invoked with progress percentage (0-100) as chunks complete */
  onProgress?: (percent: number) => void;
}

/** A started worker: the endpoint Comlink talks through and a way to stop it. */
export interface WorkerHandle {
  readonly endpoint: Comlink.Endpoint;
  /** Rejects if the worker dies; never resolves. Calls to the worker are raced against it. */
  readonly failed?: Promise<never>;
  terminate(): Promise<unknown> | void;
}

export type WorkerFactory = (index: number) => WorkerHandle;

export interface ParallelRendererOptions {
  /** Number of workers to create (defaults to 75% of CPU cores, between 2 and 16) */
  workerCount?: number;
  /** Starts one worker; defaults to a worker_threads Worker running fractal.worker */
  createWorker?: WorkerFactory;
  chunkOptions?: ChunkOptions;
}

/**
 * Wraps a started worker thread. An 'error' from the thread (including a
 * script that fails to load) rejects `failed` instead of crashing the process.
 */
export function threadWorkerHandle(worker: Worker): WorkerHandle {
  const failed = new Promise<never>((_, reject) => {
    worker.once("error", reject);
  });
  return {
    endpoint: nodeEndpoint(worker),
    failed,
    terminate: () => worker.terminate(),
  };
}

/**
 * Starts the compiled worker entry point that sits beside this module in dist/.
 */
export const createThreadWorker: WorkerFactory = () =>
  threadWorkerHandle(new Worker(new URL("../workers/fractal.worker.js", import.meta.url)));

/** Settles with `call`, or rejects as soon as the worker behind `handle` dies. */
const raceWorkerFailure = <T>(handle: WorkerHandle, call: Promise<T>): Promise<T> =>
  handle.failed ? Promise.race([call, handle.failed]) : call;

/**
 * ParallelRenderer orchestrates fractal computation across a pool of workers.
 *
 * The raster is split into tiles that partition it, so each worker result is
 * written to a range no other worker touches and no locking is needed. The
 * raster is only returned once every tile has arrived.
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer({ workerCount: 4 });
 * await renderer.init();
 * const raster = await renderer.render(viewport, dimensions, params, palette, {
 *   onProgress: (pct) => console.log(`${pct}% complete`),
 * });
 * await renderer.terminate();
 * ```
 */
export class ParallelRenderer {
  private workers: Array<{ handle: WorkerHandle; api: Comlink.Remote<FractalWorkerAPI> }> = [];
  private readonly workerCount: number;
  private readonly createWorker: WorkerFactory;
  private readonly chunkOptions: ChunkOptions;
  private isInitialized = false;
  private performanceMonitor: PerformanceMonitor;

  constructor(options: ParallelRendererOptions = {}) {
    if (options.workerCount !== undefined) {
      requirePositiveInteger(options.workerCount, "workerCount");
    }
    this.workerCount = options.workerCount ?? this.getOptimalWorkerCount();
    this.createWorker = options.createWorker ?? createThreadWorker;
    this.chunkOptions = options.chunkOptions ?? DEFAULT_CHUNK_OPTIONS;
    this.performanceMonitor = new PerformanceMonitor();
  }

  /**
   * Calculates the optimal number of workers based on available CPU cores.
   * Uses 75% of cores, with a minimum of 2 and maximum of 16.
   */
  private getOptimalWorkerCount(): number {
    const cpuCount = availableParallelism();
    return Math.max(2, Math.min(16, Math.floor(cpuCount * 0.75)));
  }

  /**
   * Initializes the worker pool. Must be called before render().
   * Creates workers and wraps them with Comlink for RPC communication.
   */
  async init(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    for (let i = 0; i < this.workerCount; i++) {
      const handle = this.createWorker(i);
      const api = Comlink.wrap<FractalWorkerAPI>(handle.endpoint);
      this.workers.push({ handle, api });

      // Test connectivity with ping
      let response: string;
      try {
        response = await raceWorkerFailure(handle, api.ping());
      } catch (error) {
        await this.terminate();
        throw new Error(`Worker ${i} failed to start`, { cause: error });
      }
      if (response !== "pong") {
        await this.terminate();
        throw new Error(`Worker ${i} failed to respond to ping`);
      }
    }

    this.isInitialized = true;
    console.log(`ParallelRenderer initialized with ${this.workerCount} workers`);
  }

  /**
   * Renders the full raster using parallel computation.
   *
   * Configuration is validated on the calling thread before any chunk is
   * dispatched. Pixel values match those of render() for the same inputs.
   *
   * @throws ConfigurationError for invalid configuration
   * @throws Error if not initialized or if a worker fails
   */
  async render(
    viewport: Viewport,
    dimensions: RasterDimensions,
    params: FractalParams,
    palette: Palette,
    options?: RenderOptions
  ): Promise<OutputRaster> {
    if (!this.isInitialized) {
      throw new Error("ParallelRenderer not initialized. Call init() first.");
    }

    createRenderPipeline(viewport, dimensions, params, palette);

    const startTime = performance.now();
    const raster = createRaster(dimensions);
    const chunks = createChunks(dimensions.width, dimensions.height, this.chunkOptions);
    const totalChunks = chunks.length;
    let completedChunks = 0;
    // Set once the render has been rejected; chunks still in flight are then dropped
    let failed = false;

    console.log(
      `Starting parallel render: ${dimensions.width}x${dimensions.height}, ` +
        `center=(${viewport.center.re}, ${viewport.center.im}), halfHeight=${viewport.halfHeight}, ` +
        `${totalChunks} chunks`
    );

    const sessionId = this.performanceMonitor.startRender(totalChunks, dimensions.width * dimensions.height);
    const request: Omit<ChunkComputeRequest, "chunk"> = {
      viewport: serializeViewport(viewport),
      dimensions: { width: dimensions.width, height: dimensions.height },
      params,
      palette: palette.spec,
    };

    try {
      await Promise.all(
        chunks.map(async (chunk, index) => {
          const chunkStartTime = performance.now();
          const result = await this.computeChunkWithWorker(chunk, index, request);
          if (failed) return;

          this.performanceMonitor.recordChunk(
            sessionId,
            index,
            performance.now() - chunkStartTime,
            chunk.width * chunk.height
          );
          blitChunk(raster, chunk, result.pixels);

          completedChunks++;
          options?.onProgress?.((completedChunks / totalChunks) * 100);
        })
      );
    } catch (error) {
      failed = true;
      this.performanceMonitor.abandonRender(sessionId);
      console.error("Render failed:", error);
      throw error;
    }

    const metrics = this.performanceMonitor.endRender(sessionId);
    console.log(
      `Parallel render complete: ${totalChunks} chunks in ${(performance.now() - startTime).toFixed(1)}ms ` +
        `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s)`
    );

    return raster;
  }

  /**
   * Computes a single chunk on a worker. Workers are assigned in a
   * round-robin fashion by chunk index.
   */
  private async computeChunkWithWorker(
    chunk: RenderChunk,
    chunkIndex: number,
    request: Omit<ChunkComputeRequest, "chunk">
  ): Promise<ChunkComputeResult> {
    const workerIndex = chunkIndex % this.workers.length;
    const { handle, api } = this.workers[workerIndex];

    try {
      return await raceWorkerFailure(handle, api.computeChunk({ ...request, chunk }));
    } catch (error) {
      console.error(`Worker ${workerIndex} failed to compute chunk ${chunkIndex}:`, error);
      throw error;
    }
  }

  /**
   * Releases the Comlink proxies and stops all workers.
   * Should be called when the renderer is no longer needed.
   */
  async terminate(): Promise<void> {
    const workers = this.workers;
    this.workers = [];
    this.isInitialized = false;

    await Promise.all(
      workers.map(async ({ handle, api }) => {
        api[Comlink.releaseProxy]();
        await handle.terminate();
      })
    );
    console.log("ParallelRenderer terminated");
  }

  /**
   * Gets the number of workers in the pool.
   */
  getWorkerCount(): number {
    return this.workerCount;
  }

  getPerformanceMonitor(): PerformanceMonitor {
    return this.performanceMonitor;
  }
}
