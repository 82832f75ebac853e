// ABOUTME: Eager validation of render configuration
// ABOUTME: Every check throws ConfigurationError before any per-pixel work starts

import type { ColoringOptions, FractalParams, RasterDimensions, RGB } from "../fractals/types.js";
import type { Complex } from "./complex.js";
import { ConfigurationError } from "./errors.js";

const formatValue = (value: unknown): string =>
  typeof value === "number" ? String(value) : JSON.stringify(value) ?? String(value);

export function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive integer, got ${formatValue(value)}`);
  }
}

export function requirePositiveNumber(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive finite number, got ${formatValue(value)}`);
  }
}

export function requireFiniteNumber(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${field} must be a finite number, got ${formatValue(value)}`);
  }
}

export function requireFiniteComplex(value: Complex, field: string): void {
  requireFiniteNumber(value.re, `${field}.re`);
  requireFiniteNumber(value.im, `${field}.im`);
}

export function validateColor(color: RGB, field: string): void {
  if (color.length !== 3 || color.some((channel) => !Number.isFinite(channel) || channel < 0 || channel > 255)) {
    throw new ConfigurationError(`${field} must be three channels in [0, 255], got ${formatValue(color)}`);
  }
}

export function validateDimensions(dimensions: RasterDimensions): void {
  requirePositiveInteger(dimensions.width, "dimensions.width");
  requirePositiveInteger(dimensions.height, "dimensions.height");
}

export function validateColoringOptions(coloring: ColoringOptions): void {
  requirePositiveNumber(coloring.trapFalloff, "coloring.trapFalloff");
  if (!(coloring.iterationBlend >= 0 && coloring.iterationBlend <= 1)) {
    throw new ConfigurationError(
      `coloring.iterationBlend must be in [0, 1], got ${formatValue(coloring.iterationBlend)}`
    );
  }
  validateColor(coloring.interiorColor, "coloring.interiorColor");
}

/**
 * Checks everything in FractalParams except the trap geometry, which is
 * validated where it is constructed (see createOrbitTrap).
 */
export function validateFractalParams(params: FractalParams): void {
  requirePositiveInteger(params.maxIterations, "params.maxIterations");
  requirePositiveNumber(params.escapeRadius, "params.escapeRadius");

  const { algorithm } = params;
  switch (algorithm.type) {
    case "mandelbrot":
      break;
    case "julia":
      requireFiniteComplex(algorithm.c, "params.algorithm.c");
      break;
    default: {
      const unknown: never = algorithm;
      throw new ConfigurationError(`Unknown fractal algorithm ${formatValue(unknown)}`);
    }
  }

  validateColoringOptions(params.coloring);
}
