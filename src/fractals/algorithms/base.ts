import type { FractalParams, OrbitTrapSpec } from "../types.js";

/**
 * Result of iterating a single point in the complex plane.
 * Computed fresh per pixel and only kept long enough to be colored.
 */
export interface PixelResult {
  /** Whether |z|² reached the escape radius squared before maxIterations */
  escaped: boolean;
  /** Iteration at which the orbit escaped, or maxIterations if it never did */
  iterations: number;
  /**
   * Closest approach of the orbit to the trap geometry. Infinity only when no
   * sample was taken, i.e. the starting value itself escaped.
   */
  trapDistance: number;
  /** Real component of the last z value reached */
  zr: number;
  /** Imaginary component of the last z value reached */
  zi: number;
}

/**
 * Geometry an orbit is measured against for orbit-trap coloring.
 */
export interface OrbitTrap {
  readonly spec: OrbitTrapSpec;
  /** Non-negative distance from z = zr + zi·i to the trap. */
  distance(zr: number, zi: number): number;
}

/** The parts of FractalParams that bound the iteration. */
export type EscapeParams = Pick<FractalParams, "maxIterations" | "escapeRadius">;

/** One sampled orbit value, as recorded by traceOrbit. */
export interface OrbitSample {
  /** n for the sampled value z_n (samples start at n = 1) */
  iteration: number;
  zr: number;
  zi: number;
  distance: number;
  /** Running minimum of distance up to and including this sample */
  minDistance: number;
}

export interface OrbitTrace {
  result: PixelResult;
  samples: OrbitSample[];
}

/**
 * Interface that every escape-time fractal implements. Implementations are
 * stateless: identical inputs always produce identical results, so a single
 * instance may be shared by any number of concurrent pixel computations.
 */
export interface FractalAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  readonly description?: string;

  /**
   * Iterates the recurrence for one point of the plane, tracking escape and
   * the closest approach to `trap`.
   *
   * @param real - Real component of the pixel's plane coordinate
   * @param imag - Imaginary component of the pixel's plane coordinate
   */
  computePoint(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): PixelResult;

  /**
   * Same iteration as computePoint, but records every trap sample. Intended
   * for diagnostics; it allocates per iteration.
   */
  traceOrbit(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): OrbitTrace;
}
