import { describe, expect, it } from "vitest";

import { JuliaAlgorithm, MandelbrotAlgorithm, mandelbrotAlgorithm } from "./mandelbrot.js";
import { PointTrap } from "./orbit-traps.js";

describe("MandelbrotAlgorithm", () => {
  const algorithm = new MandelbrotAlgorithm();
  const maxIterations = 1000;
  const params = { maxIterations, escapeRadius: 2 };
  const originTrap = new PointTrap({ type: "point", at: { re: 0, im: 0 } });

  describe("metadata", () => {
    it("should have correct name", () => {
      expect(algorithm.name).toBe("Mandelbrot Set");
    });

    it("should have a description", () => {
      expect(typeof algorithm.description).toBe("string");
    });
  });

  describe("computePoint", () => {
    it("should iterate to maxIterations for point at origin (in the set)", () => {
      const result = algorithm.computePoint(0, 0, params, originTrap);
      expect(result.escaped).toBe(false);
      expect(result.iterations).toBe(maxIterations);
      expect(result.trapDistance).toBe(0);
    });

    it("should iterate to maxIterations for point at (-1, 0) (in the set)", () => {
      const result = algorithm.computePoint(-1, 0, params, originTrap);
      expect(result.escaped).toBe(false);
      expect(result.iterations).toBe(maxIterations);
      // the orbit alternates -1, 0, -1, ...
      expect(result.trapDistance).toBe(0);
    });

    it("should escape at iteration 1 for c = 2 with the escape value as the trap minimum", () => {
      const result = algorithm.computePoint(2, 0, params, originTrap);
      expect(result).toEqual({ escaped: true, iterations: 1, trapDistance: 2, zr: 2, zi: 0 });
    });

    it("should escape immediately for point at (2, 2)", () => {
      const result = algorithm.computePoint(2, 2, params, originTrap);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(1);
      expect(result.zr * result.zr + result.zi * result.zi).toBeGreaterThanOrEqual(4);
    });

    it("should escape for point at (0.4, 0.4)", () => {
      const result = algorithm.computePoint(0.4, 0.4, params, originTrap);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBeGreaterThan(5);
      expect(result.iterations).toBeLessThan(maxIterations);
    });

    it("should handle point at (-0.5, 0) (in the set)", () => {
      const result = algorithm.computePoint(-0.5, 0, params, originTrap);
      expect(result.escaped).toBe(false);
      expect(result.iterations).toBe(maxIterations);
    });

    it("should escape for point at (0.5, 0)", () => {
      const result = algorithm.computePoint(0.5, 0, params, originTrap);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBeLessThan(maxIterations);
    });

    it("should handle edge case: point at (-0.75, 0.1) (near boundary)", () => {
      const result = algorithm.computePoint(-0.75, 0.1, params, originTrap);
      expect(result.iterations).toBeGreaterThan(0);
      expect(result.iterations).toBeLessThan(maxIterations);
    });

    it("should be consistent with repeated calls", () => {
      const result1 = algorithm.computePoint(0.4, 0.4, params, originTrap);
      const result2 = algorithm.computePoint(0.4, 0.4, params, originTrap);
      expect(result2).toEqual(result1);
    });

    it("should respect maxIterations parameter", () => {
      expect(algorithm.computePoint(0, 0, { maxIterations: 10, escapeRadius: 2 }, originTrap).iterations).toBe(10);
      expect(algorithm.computePoint(0, 0, { maxIterations: 100, escapeRadius: 2 }, originTrap).iterations).toBe(100);
    });

    it("should use the configured escape radius", () => {
      // 0 → 2 → 6 → 38, and 38² is the first square at or above 10²
      const result = algorithm.computePoint(2, 0, { maxIterations, escapeRadius: 10 }, originTrap);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(3);
      expect(result.zr).toBe(38);
      expect(result.trapDistance).toBe(2);
    });

    it("should never report a negative trap distance", () => {
      for (const [re, im] of [[0.3, 0.5], [-1.2, 0.2], [0.25, 0], [-2, 0]]) {
        expect(algorithm.computePoint(re, im, params, originTrap).trapDistance).toBeGreaterThanOrEqual(0);
      }
    });
  });

  describe("traceOrbit", () => {
    it("should agree with computePoint", () => {
      for (const [re, im] of [[0.4, 0.4], [-0.75, 0.1], [-0.5, 0]]) {
        const trace = algorithm.traceOrbit(re, im, params, originTrap);
        expect(trace.result).toEqual(algorithm.computePoint(re, im, params, originTrap));
      }
    });

    it("should record one sample per iteration with a non-increasing running minimum", () => {
      const { result, samples } = algorithm.traceOrbit(0.4, 0.4, params, originTrap);
      expect(samples).toHaveLength(result.iterations);
      expect(samples[0].iteration).toBe(1);

      for (let i = 1; i < samples.length; i++) {
        expect(samples[i].minDistance).toBeLessThanOrEqual(samples[i - 1].minDistance);
        expect(samples[i].minDistance).toBe(Math.min(samples[i - 1].minDistance, samples[i].distance));
      }
      expect(samples[samples.length - 1].minDistance).toBe(result.trapDistance);
    });

    it("should start the orbit at z = 0 without sampling it", () => {
      const { samples } = algorithm.traceOrbit(0.25, 0.5, { maxIterations: 3, escapeRadius: 2 }, originTrap);
      expect(samples[0]).toMatchObject({ iteration: 1, zr: 0.25, zi: 0.5 });
    });
  });

  it("should export a default instance", () => {
    expect(mandelbrotAlgorithm).toBeInstanceOf(MandelbrotAlgorithm);
  });
});

describe("JuliaAlgorithm", () => {
  const params = { maxIterations: 200, escapeRadius: 2 };
  const originTrap = new PointTrap({ type: "point", at: { re: 0, im: 0 } });

  it("should start from the pixel and add the fixed parameter", () => {
    const julia = new JuliaAlgorithm({ re: 0, im: 0 });
    // z → z² from 0.5 converges to 0
    expect(julia.computePoint(0.5, 0, params, originTrap).escaped).toBe(false);
    // 1.5 → 2.25, which is past the radius
    expect(julia.computePoint(1.5, 0, params, originTrap)).toMatchObject({ escaped: true, iterations: 1 });
  });

  it("should report an infinite trap distance when the starting value already escaped", () => {
    const julia = new JuliaAlgorithm({ re: -0.8, im: 0.156 });
    const result = julia.computePoint(3, 0, params, originTrap);
    expect(result).toEqual({ escaped: true, iterations: 0, trapDistance: Infinity, zr: 3, zi: 0 });
  });

  it("should differ from the Mandelbrot iteration for the same pixel", () => {
    const julia = new JuliaAlgorithm({ re: 0.285, im: 0.01 });
    const trace = julia.traceOrbit(0.1, 0.2, { maxIterations: 1, escapeRadius: 2 }, originTrap);
    // 0.1² - 0.2² + 0.285 = 0.255, 2·0.1·0.2 + 0.01 = 0.05
    expect(trace.samples[0].zr).toBeCloseTo(0.255, 12);
    expect(trace.samples[0].zi).toBeCloseTo(0.05, 12);
  });
});
