// ABOUTME: Mandelbrot and Julia set algorithm implementations
// ABOUTME: Both iterate z → z² + c; they differ in the starting value and which term the pixel supplies

import type { Complex } from "../../lib/complex.js";
import type { EscapeParams, FractalAlgorithm, OrbitTrace, OrbitTrap, PixelResult } from "./base.js";
import { iterateQuadratic, traceQuadratic } from "./escape-time.js";

/**
 * Mandelbrot Set algorithm implementation.
 *
 * The Mandelbrot set is defined as the set of complex numbers c for which
 * the function f(z) = z² + c does not diverge when iterated from z = 0.
 *
 * For each point c in the complex plane, we iterate:
 *   z₀ = 0
 *   z_{n+1} = z_n² + c
 *
 * Points that never reach the escape radius within maxIterations are
 * considered part of the set.
 */
export class MandelbrotAlgorithm implements FractalAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): PixelResult {
    const radius = params.escapeRadius;
    return iterateQuadratic(0, 0, real, imag, params.maxIterations, radius * radius, trap);
  }

  traceOrbit(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): OrbitTrace {
    const radius = params.escapeRadius;
    return traceQuadratic(0, 0, real, imag, params.maxIterations, radius * radius, trap);
  }
}

/**
 * Julia set for a fixed parameter c: the pixel is the starting value z₀ and
 * every pixel shares the same c.
 */
export class JuliaAlgorithm implements FractalAlgorithm {
  readonly name = "Julia Set";
  readonly description: string;

  constructor(readonly c: Complex) {
    this.description = `Filled Julia set of z → z² + (${c.re} + ${c.im}i), starting from the pixel`;
  }

  computePoint(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): PixelResult {
    const radius = params.escapeRadius;
    return iterateQuadratic(real, imag, this.c.re, this.c.im, params.maxIterations, radius * radius, trap);
  }

  traceOrbit(real: number, imag: number, params: EscapeParams, trap: OrbitTrap): OrbitTrace {
    const radius = params.escapeRadius;
    return traceQuadratic(real, imag, this.c.re, this.c.im, params.maxIterations, radius * radius, trap);
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
