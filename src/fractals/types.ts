import type { Decimal } from "decimal.js";

import type { Complex } from "../lib/complex.js";
import type { Palette } from "./coloring/palette.js";

/** RGB triple with channels in 0-255 */
export type RGB = [r: number, g: number, b: number];

// --- View ---

/**
 * Visible region of the complex plane. The half-width is derived from the
 * raster's aspect ratio, so only the vertical extent is stored.
 */
export type Viewport = {
  readonly center: { readonly re: Decimal; readonly im: Decimal };
  readonly halfHeight: Decimal;
};

export type RasterDimensions = {
  readonly width: number;
  readonly height: number;
};

// --- Fractal parameters ---

// Discriminated union of the supported recurrences
export type MandelbrotSpec = { type: "mandelbrot" };
export type JuliaSpec = { type: "julia"; c: Complex };
export type AlgorithmSpec = MandelbrotSpec | JuliaSpec;

export type PointTrapSpec = { type: "point"; at: Complex };
export type CircleTrapSpec = { type: "circle"; center: Complex; radius: number };
export type LineTrapSpec = { type: "line"; through: Complex; direction: Complex };
export type CrossTrapSpec = { type: "cross"; at: Complex };
export type OrbitTrapSpec = PointTrapSpec | CircleTrapSpec | LineTrapSpec | CrossTrapSpec;

export type ColoringOptions = {
  /** Rate at which trap proximity fades: trapValue = exp(-trapFalloff * distance) */
  trapFalloff: number;
  /** Weight in [0, 1] of the smooth iteration count blended into the trap value */
  iterationBlend: number;
  /** Color for points that never escaped */
  interiorColor: RGB;
};

export type FractalParams = {
  algorithm: AlgorithmSpec;
  maxIterations: number;
  escapeRadius: number;
  trap: OrbitTrapSpec;
  coloring: ColoringOptions;
};

// --- Output ---

/** Row-major pixel buffer, three bytes (R, G, B) per pixel. */
export type OutputRaster = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type RenderConfig = {
  readonly viewport: Viewport;
  readonly dimensions: RasterDimensions;
  readonly params: FractalParams;
  readonly palette: Palette;
};

// --- Collaborators ---

/** Encodes and persists a finished raster; the renderer knows nothing of file formats. */
export interface ImageWriter {
  write(raster: OutputRaster, target: string): Promise<void>;
}

/** Supplies render configuration, e.g. from command-line flags or a config file. */
export interface RenderConfigLoader {
  load(): Promise<RenderConfig>;
}
