export interface RenderChunk {
  startX: number;
  startY: number;
  width: number;
  height: number;
}

export type ChunkOptions = {
  preferredNumber: number;
  minSize: number;
  maxSize: number;
};

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { preferredNumber: 250, minSize: 20, maxSize: 1000 };

/**
 * This function divides an area (e.g. a raster) of width x height pixels into
 * square tiles for rendering. Tiles on the right and bottom edges are clipped.
 *
 * The tiles partition the area: every pixel belongs to exactly one tile, so
 * workers given different tiles never write the same output cell. Tiles are
 * ordered center-out, with ties kept in row-major order.
 *
 * @param width of the area to divide into chunks
 * @param height of the area to divide into chunks
 * @param options for the chunk size calculation. the defaults are pretty sensible
 * @returns an array of chunks
 */
export function createChunks(width: number, height: number, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): RenderChunk[] {
  if (width <= 0 || height <= 0) return [];

  const chunkSize = calculateOptimalChunkSize(width, height, options);
  const chunks: RenderChunk[] = [];

  for (let startY = 0; startY < height; startY += chunkSize) {
    for (let startX = 0; startX < width; startX += chunkSize) {
      chunks.push({
        startX,
        startY,
        width: Math.min(chunkSize, width - startX),
        height: Math.min(chunkSize, height - startY),
      });
    }
  }

  const centerX = width / 2;
  const centerY = height / 2;
  const distanceToCenter = (chunk: RenderChunk): number => {
    const dx = chunk.startX + chunk.width / 2 - centerX;
    const dy = chunk.startY + chunk.height / 2 - centerY;
    return dx * dx + dy * dy;
  };

  // Array.prototype.sort is stable, so equidistant tiles stay in row-major order
  return chunks.sort((a, b) => distanceToCenter(a) - distanceToCenter(b));
}

export function calculateOptimalChunkSize(width: number, height: number, options: ChunkOptions): number {
  const totalPixels = width * height;
  const targetChunkPixels = totalPixels / options.preferredNumber;
  const chunkSize = Math.floor(Math.sqrt(targetChunkPixels));
  return Math.max(1, options.minSize, Math.min(options.maxSize, chunkSize));
}
