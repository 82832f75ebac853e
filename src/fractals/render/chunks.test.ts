import { describe, expect, it } from "vitest";

import { calculateOptimalChunkSize, createChunks, DEFAULT_CHUNK_OPTIONS } from "./chunks.js";

describe("calculateOptimalChunkSize", () => {
  it("should target the preferred number of chunks", () => {
    // sqrt(1000 * 1000 / 250) ≈ 63.2
    expect(calculateOptimalChunkSize(1000, 1000, DEFAULT_CHUNK_OPTIONS)).toBe(63);
  });

  it("should respect the minimum and maximum size", () => {
    expect(calculateOptimalChunkSize(10, 10, DEFAULT_CHUNK_OPTIONS)).toBe(20);
    expect(calculateOptimalChunkSize(100000, 100000, { preferredNumber: 1, minSize: 1, maxSize: 500 })).toBe(500);
  });

  it("should never return less than 1", () => {
    expect(calculateOptimalChunkSize(1, 1, { preferredNumber: 250, minSize: 0, maxSize: 1000 })).toBe(1);
  });
});

describe("createChunks", () => {
  it("should return no chunks for an empty area", () => {
    expect(createChunks(0, 10)).toEqual([]);
    expect(createChunks(10, 0)).toEqual([]);
  });

  it("should return a single chunk for a small area", () => {
    expect(createChunks(10, 10)).toEqual([{ startX: 0, startY: 0, width: 10, height: 10 }]);
  });

  it.each([
    [100, 100],
    [37, 53],
    [1, 1],
    [500, 20],
    [2048, 3],
  ])("should cover a %ix%i area exactly once", (width, height) => {
    const coverage = new Uint8Array(width * height);
    for (const chunk of createChunks(width, height, { preferredNumber: 16, minSize: 1, maxSize: 1000 })) {
      expect(chunk.width).toBeGreaterThan(0);
      expect(chunk.height).toBeGreaterThan(0);
      expect(chunk.startX + chunk.width).toBeLessThanOrEqual(width);
      expect(chunk.startY + chunk.height).toBeLessThanOrEqual(height);

      for (let y = chunk.startY; y < chunk.startY + chunk.height; y++) {
        for (let x = chunk.startX; x < chunk.startX + chunk.width; x++) {
          coverage[y * width + x]++;
        }
      }
    }
    expect(coverage.every((count) => count === 1)).toBe(true);
  });

  it("should order chunks from the center outwards", () => {
    const chunks = createChunks(90, 90, { preferredNumber: 9, minSize: 1, maxSize: 1000 });

    expect(chunks).toHaveLength(9);
    expect(chunks[0]).toEqual({ startX: 30, startY: 30, width: 30, height: 30 });
    expect(chunks.slice(1, 5).map((c) => [c.startX, c.startY])).toEqual([
      [30, 0],
      [0, 30],
      [60, 30],
      [30, 60],
    ]);
  });
});
