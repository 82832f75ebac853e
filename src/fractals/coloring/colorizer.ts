// ABOUTME: Palette mapper turning a PixelResult into a final color
// ABOUTME: Derives t from trap distance, optionally blended with the smooth iteration count

import type { PixelResult } from "../algorithms/base.js";
import type { FractalParams, RGB } from "../types.js";
import { clamp01 } from "./color.js";
import type { Palette } from "./palette.js";

/**
 * Continuous escape count for an escaped orbit.
 *
 * Uses μ = n − log₂(ln|z_n| / ln R), which equals n when |z_n| is exactly the
 * escape radius and falls smoothly as |z_n| overshoots it. Falls back to the
 * raw count when the radius is at most 1 or the orbit never escaped.
 */
export function smoothIterationCount(result: PixelResult, escapeRadius: number): number {
  if (!result.escaped || escapeRadius <= 1) return result.iterations;

  const logModulus = Math.log(result.zr * result.zr + result.zi * result.zi) / 2;
  const ratio = logModulus / Math.log(escapeRadius);
  if (!(ratio >= 1) || !Number.isFinite(ratio)) return result.iterations;

  return result.iterations - Math.log2(ratio);
}

/**
 * Normalized palette position for an escaped pixel. Orbits that pass closer
 * to the trap get larger values; a non-finite distance contributes 0.
 */
export function deriveColorValue(result: PixelResult, params: FractalParams): number {
  const { trapFalloff, iterationBlend } = params.coloring;

  const trapValue = Number.isFinite(result.trapDistance) ? Math.exp(-trapFalloff * result.trapDistance) : 0;
  if (iterationBlend === 0) return clamp01(trapValue);

  const iterationValue = clamp01(smoothIterationCount(result, params.escapeRadius) / params.maxIterations);
  return clamp01((1 - iterationBlend) * trapValue + iterationBlend * iterationValue);
}

export type Colorizer = (result: PixelResult) => RGB;

/**
 * Binds the coloring strategy once per render. Interior points take the
 * configured interior color; escaped points are looked up in the palette.
 */
export function createColorizer(params: FractalParams, palette: Palette): Colorizer {
  const interior: RGB = [...params.coloring.interiorColor];
  return (result) => (result.escaped ? palette.colorAt(deriveColorValue(result, params)) : interior);
}
