// ABOUTME: Escape-time iteration of the quadratic recurrence z → z² + c
// ABOUTME: Shared by the Mandelbrot and Julia algorithms, with orbit-trap tracking

import type { OrbitSample, OrbitTrace, OrbitTrap, PixelResult } from "./base.js";

/**
 * Iterates z_{n+1} = z_n² + c from z_0 = (z0r, z0i).
 *
 * At each step n the escape test |z_n|² ≥ R² runs first; a passing z_n stops
 * the loop with iterations = n. Otherwise z_{n+1} is computed and sampled
 * against the trap before its own escape test, so the escaping value is part
 * of the trap minimum and z_0 is not.
 *
 * The squares of both components are computed once per step and reused for
 * both the escape test and the next real part; no square root is taken here.
 */
export function iterateQuadratic(
  z0r: number,
  z0i: number,
  cr: number,
  ci: number,
  maxIterations: number,
  escapeRadiusSquared: number,
  trap: OrbitTrap
): PixelResult {
  let zr = z0r;
  let zi = z0i;
  let minDistance = Infinity;
  let n = 0;

  while (n < maxIterations) {
    const zr2 = zr * zr;
    const zi2 = zi * zi;
    if (zr2 + zi2 >= escapeRadiusSquared) {
      return { escaped: true, iterations: n, trapDistance: minDistance, zr, zi };
    }

    // (zr + zi·i)² = zr² - zi² + 2·zr·zi·i
    zi = 2 * zr * zi + ci;
    zr = zr2 - zi2 + cr;
    n++;

    const distance = trap.distance(zr, zi);
    if (distance < minDistance) minDistance = distance;
  }

  return { escaped: false, iterations: maxIterations, trapDistance: minDistance, zr, zi };
}

/**
 * iterateQuadratic with every trap sample recorded.
 */
export function traceQuadratic(
  z0r: number,
  z0i: number,
  cr: number,
  ci: number,
  maxIterations: number,
  escapeRadiusSquared: number,
  trap: OrbitTrap
): OrbitTrace {
  const samples: OrbitSample[] = [];
  let zr = z0r;
  let zi = z0i;
  let minDistance = Infinity;
  let n = 0;

  while (n < maxIterations) {
    const zr2 = zr * zr;
    const zi2 = zi * zi;
    if (zr2 + zi2 >= escapeRadiusSquared) {
      return { result: { escaped: true, iterations: n, trapDistance: minDistance, zr, zi }, samples };
    }

    zi = 2 * zr * zi + ci;
    zr = zr2 - zi2 + cr;
    n++;

    const distance = trap.distance(zr, zi);
    if (distance < minDistance) minDistance = distance;
    samples.push({ iteration: n, zr, zi, distance, minDistance });
  }

  return {
    result: { escaped: false, iterations: maxIterations, trapDistance: minDistance, zr, zi },
    samples,
  };
}
