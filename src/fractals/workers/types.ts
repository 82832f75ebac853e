// ABOUTME: Type definitions for worker communication
// ABOUTME: Defines request/response interfaces for chunk-based fractal computation

import type { Decimal } from "decimal.js";

import { ViewportDecimal } from "../../lib/coordinates.js";
import type { PaletteSpec } from "../coloring/palette.js";
import type { FractalParams, RasterDimensions, Viewport } from "../types.js";

/**
 * Serializable version of Viewport where Decimal objects are converted to strings
 * for safe transmission via postMessage (structured clone algorithm).
 */
export interface SerializableViewport {
  center: { re: string; im: string };
  halfHeight: string;
}

/**
 * Rectangle defining a chunk of the raster to compute.
 */
export interface ChunkBounds {
  /** X coordinate of chunk's top-left corner (in raster pixels) */
  startX: number;
  /** Y coordinate of chunk's top-left corner (in raster pixels) */
  startY: number;
  /** Width of chunk in pixels */
  width: number;
  /** Height of chunk in pixels */
  height: number;
}

/**
 * Request sent to a worker to compute a fractal chunk. Everything in it
 * survives structured cloning: the viewport travels as strings and the
 * palette as its spec.
 */
export interface ChunkComputeRequest {
  /** Bounds of the chunk to compute */
  chunk: ChunkBounds;
  viewport: SerializableViewport;
  /** Full raster dimensions (needed for coordinate transformations) */
  dimensions: RasterDimensions;
  params: FractalParams;
  palette: PaletteSpec;
}

/**
 * Result returned from a worker after computing a chunk.
 */
export interface ChunkComputeResult {
  /** Bounds of the computed chunk (matches request) */
  chunk: ChunkBounds;
  /** Row-major RGB bytes for the chunk alone, width * height * 3 long */
  pixels: Uint8ClampedArray;
}

export function serializeViewport(viewport: Viewport): SerializableViewport {
  return {
    center: {
      re: viewport.center.re.toString(),
      im: viewport.center.im.toString(),
    },
    halfHeight: viewport.halfHeight.toString(),
  };
}

/**
 * Restores the Decimal values of a serialized viewport. The strings came
 * from an already validated viewport, so no validation is repeated here.
 */
export function deserializeViewport(serialized: SerializableViewport): Viewport {
  const toDecimal = (value: string): Decimal => new ViewportDecimal(value);
  return {
    center: {
      re: toDecimal(serialized.center.re),
      im: toDecimal(serialized.center.im),
    },
    halfHeight: toDecimal(serialized.halfHeight),
  };
}
