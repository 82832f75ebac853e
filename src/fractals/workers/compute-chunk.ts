// ABOUTME: Core chunk computation logic for worker threads
// ABOUTME: Converts a raster chunk into computed fractal pixel data

import { createPalette } from "../coloring/palette.js";
import { CHANNELS, createRenderPipeline, renderChunkInto } from "../render/pipeline.js";
import { type ChunkComputeRequest, type ChunkComputeResult, deserializeViewport } from "./types.js";

/**
 * Computes fractal pixel data for a specific rectangular chunk of the raster.
 *
 * Runs inside a worker thread:
 * 1. Rebuilds the viewport and palette from their serialized forms
 * 2. Resolves the render pipeline (transform, algorithm, trap, colorizer)
 * 3. Computes every pixel of the chunk into a chunk-sized RGB buffer
 *
 * Pixel values are identical to those of a single-threaded render of the
 * same configuration, since both go through renderChunkInto.
 */
export function computeChunk(request: ChunkComputeRequest): ChunkComputeResult {
  const { chunk, dimensions, params } = request;

  const pipeline = createRenderPipeline(
    deserializeViewport(request.viewport),
    dimensions,
    params,
    createPalette(request.palette)
  );

  const pixels = new Uint8ClampedArray(chunk.width * chunk.height * CHANNELS);
  renderChunkInto(pipeline, chunk, pixels, chunk.width, chunk.startX, chunk.startY);

  return { chunk, pixels };
}
