// ABOUTME: Orbit trap geometries and their distance functions
// ABOUTME: createOrbitTrap validates a trap spec and returns the matching trap

import { type Complex, magnitude } from "../../lib/complex.js";
import { ConfigurationError } from "../../lib/errors.js";
import { requireFiniteComplex, requireFiniteNumber } from "../../lib/validation.js";
import type { CircleTrapSpec, CrossTrapSpec, LineTrapSpec, OrbitTrapSpec, PointTrapSpec } from "../types.js";
import type { OrbitTrap } from "./base.js";

/** Euclidean distance to a single point. */
export class PointTrap implements OrbitTrap {
  private readonly x: number;
  private readonly y: number;

  constructor(readonly spec: PointTrapSpec) {
    this.x = spec.at.re;
    this.y = spec.at.im;
  }

  distance(zr: number, zi: number): number {
    const dx = zr - this.x;
    const dy = zi - this.y;
    return Math.sqrt(dx * dx + dy * dy);
  }
}

/** Distance to the circumference of a circle (zero anywhere on the ring). */
export class CircleTrap implements OrbitTrap {
  private readonly x: number;
  private readonly y: number;
  private readonly radius: number;

  constructor(readonly spec: CircleTrapSpec) {
    this.x = spec.center.re;
    this.y = spec.center.im;
    this.radius = spec.radius;
  }

  distance(zr: number, zi: number): number {
    const dx = zr - this.x;
    const dy = zi - this.y;
    return Math.abs(Math.sqrt(dx * dx + dy * dy) - this.radius);
  }
}

/** Perpendicular distance to an infinite line through a point. */
export class LineTrap implements OrbitTrap {
  private readonly x: number;
  private readonly y: number;
  // unit direction
  private readonly ux: number;
  private readonly uy: number;

  constructor(readonly spec: LineTrapSpec) {
    const length = magnitude(spec.direction);
    this.x = spec.through.re;
    this.y = spec.through.im;
    this.ux = spec.direction.re / length;
    this.uy = spec.direction.im / length;
  }

  distance(zr: number, zi: number): number {
    // |(z - p) × u|
    return Math.abs((zr - this.x) * this.uy - (zi - this.y) * this.ux);
  }
}

/** Distance to the nearer of the horizontal and vertical lines through a point. */
export class CrossTrap implements OrbitTrap {
  private readonly x: number;
  private readonly y: number;

  constructor(readonly spec: CrossTrapSpec) {
    this.x = spec.at.re;
    this.y = spec.at.im;
  }

  distance(zr: number, zi: number): number {
    return Math.min(Math.abs(zr - this.x), Math.abs(zi - this.y));
  }
}

const requireNonZeroDirection = (direction: Complex): void => {
  requireFiniteComplex(direction, "trap.direction");
  if (!(magnitude(direction) > 0)) {
    throw new ConfigurationError("trap.direction must be a non-zero vector");
  }
};

/**
 * Builds the trap described by `spec`, throwing ConfigurationError for
 * geometry that has no well-defined distance.
 */
export function createOrbitTrap(spec: OrbitTrapSpec): OrbitTrap {
  switch (spec.type) {
    case "point":
      requireFiniteComplex(spec.at, "trap.at");
      return new PointTrap(spec);
    case "circle":
      requireFiniteComplex(spec.center, "trap.center");
      requireFiniteNumber(spec.radius, "trap.radius");
      if (spec.radius < 0) {
        throw new ConfigurationError(`trap.radius must not be negative, got ${spec.radius}`);
      }
      return new CircleTrap(spec);
    case "line":
      requireFiniteComplex(spec.through, "trap.through");
      requireNonZeroDirection(spec.direction);
      return new LineTrap(spec);
    case "cross":
      requireFiniteComplex(spec.at, "trap.at");
      return new CrossTrap(spec);
    default: {
      const unknown: never = spec;
      throw new ConfigurationError(`Unknown orbit trap type: ${JSON.stringify(unknown)}`);
    }
  }
}
