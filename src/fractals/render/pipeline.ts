// ABOUTME: Per-pixel pipeline shared by the single-threaded renderer and the workers
// ABOUTME: transform → escape-time evaluation → palette mapping → pixel write

import { createPlaneTransform, type PlaneTransform } from "../../lib/coordinates.js";
import { validateDimensions, validateFractalParams } from "../../lib/validation.js";
import { createAlgorithm, createOrbitTrap } from "../algorithms/index.js";
import type { FractalAlgorithm, OrbitTrap } from "../algorithms/base.js";
import { type Colorizer, createColorizer } from "../coloring/colorizer.js";
import type { Palette } from "../coloring/palette.js";
import type { FractalParams, OutputRaster, RasterDimensions, Viewport } from "../types.js";
import type { RenderChunk } from "./chunks.js";

export const CHANNELS = 3;

/**
 * Everything one render needs per pixel, resolved once up front. Read-only
 * after construction, so any number of chunk computations may share it.
 */
export interface RenderPipeline {
  readonly dimensions: RasterDimensions;
  readonly params: FractalParams;
  readonly transform: PlaneTransform;
  readonly algorithm: FractalAlgorithm;
  readonly trap: OrbitTrap;
  readonly colorize: Colorizer;
}

/**
 * Validates the configuration and resolves the pipeline. Throws
 * ConfigurationError before any pixel is computed.
 */
export function createRenderPipeline(
  viewport: Viewport,
  dimensions: RasterDimensions,
  params: FractalParams,
  palette: Palette
): RenderPipeline {
  validateDimensions(dimensions);
  validateFractalParams(params);

  return {
    dimensions,
    params,
    transform: createPlaneTransform(viewport, dimensions),
    algorithm: createAlgorithm(params.algorithm),
    trap: createOrbitTrap(params.trap),
    colorize: createColorizer(params, palette),
  };
}

export function createRaster(dimensions: RasterDimensions): OutputRaster {
  return {
    width: dimensions.width,
    height: dimensions.height,
    data: new Uint8ClampedArray(dimensions.width * dimensions.height * CHANNELS),
  };
}

/**
 * Computes every pixel of `chunk` and writes it into `target`, a row-major RGB
 * buffer `targetWidth` pixels wide whose pixel (0, 0) corresponds to raster
 * pixel (originX, originY).
 */
export function renderChunkInto(
  pipeline: RenderPipeline,
  chunk: RenderChunk,
  target: Uint8ClampedArray,
  targetWidth: number,
  originX = 0,
  originY = 0
): void {
  const { transform, algorithm, trap, colorize, params } = pipeline;

  // The transform is separable, so the real part depends only on the column
  const reals = new Float64Array(chunk.width);
  for (let x = 0; x < chunk.width; x++) {
    reals[x] = transform.realAt(chunk.startX + x);
  }

  for (let y = 0; y < chunk.height; y++) {
    const imag = transform.imagAt(chunk.startY + y);
    const rowOffset = (chunk.startY + y - originY) * targetWidth;

    for (let x = 0; x < chunk.width; x++) {
      const result = algorithm.computePoint(reals[x], imag, params, trap);
      const [r, g, b] = colorize(result);

      const index = (rowOffset + chunk.startX + x - originX) * CHANNELS;
      target[index] = r;
      target[index + 1] = g;
      target[index + 2] = b;
    }
  }
}

/**
 * Copies a chunk-sized RGB buffer into its place in the full raster.
 */
export function blitChunk(raster: OutputRaster, chunk: RenderChunk, pixels: Uint8ClampedArray): void {
  const rowLength = chunk.width * CHANNELS;
  if (pixels.length !== rowLength * chunk.height) {
    throw new Error(
      `Chunk at (${chunk.startX}, ${chunk.startY}) has ${pixels.length} bytes, expected ${rowLength * chunk.height}`
    );
  }

  for (let y = 0; y < chunk.height; y++) {
    const source = pixels.subarray(y * rowLength, (y + 1) * rowLength);
    raster.data.set(source, ((chunk.startY + y) * raster.width + chunk.startX) * CHANNELS);
  }
}
