import type { AlgorithmSpec } from "../types.js";
import type { FractalAlgorithm } from "./base.js";
import { JuliaAlgorithm, mandelbrotAlgorithm } from "./mandelbrot.js";

export type { EscapeParams, FractalAlgorithm, OrbitSample, OrbitTrace, OrbitTrap, PixelResult } from "./base.js";
export { iterateQuadratic, traceQuadratic } from "./escape-time.js";
export { JuliaAlgorithm, MandelbrotAlgorithm, mandelbrotAlgorithm } from "./mandelbrot.js";
export { CircleTrap, createOrbitTrap, CrossTrap, LineTrap, PointTrap } from "./orbit-traps.js";

/**
 * Selects the algorithm for a spec. The spec is assumed to have passed
 * validateFractalParams.
 */
export function createAlgorithm(spec: AlgorithmSpec): FractalAlgorithm {
  switch (spec.type) {
    case "mandelbrot":
      return mandelbrotAlgorithm;
    case "julia":
      return new JuliaAlgorithm(spec.c);
  }
}
