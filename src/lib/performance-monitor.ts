/**
 * Timing for a single chunk computation.
 */
export interface ChunkMetrics {
  chunkIndex: number;
  computeTime: number; // milliseconds
  pixels: number;
}

/**
 * Metrics for a complete render session.
 */
export interface RenderSessionMetrics {
  sessionId: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalChunks: number;
  completedChunks: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averageChunkTime: number;
  slowestChunkTime: number;
}

/**
 * Active render session tracking.
 */
interface RenderSession {
  sessionId: string;
  startTime: number;
  totalChunks: number;
  chunkMetrics: ChunkMetrics[];
  totalPixels: number;
}

/**
 * Performance monitor for tracking fractal rendering metrics.
 *
 * Features:
 * - Track multiple concurrent render sessions
 * - Per-chunk timing
 * - Throughput calculations (pixels/second)
 * - Session statistics and history
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRender(totalChunks, totalPixels);
 *
 * // For each chunk completion:
 * monitor.recordChunk(sessionId, chunkIndex, computeTime, chunkPixels);
 *
 * const metrics = monitor.endRender(sessionId);
 * console.log(`Render took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RenderSession>();
  private completedSessions: RenderSessionMetrics[] = [];
  private maxHistorySize = 50; // Keep last 50 sessions
  private sessionCounter = 0;

  constructor(private readonly now: () => number = () => performance.now()) {}

  /**
   * Starts a new render session.
   *
   * @param totalChunks - Total number of chunks to render
   * @param totalPixels - Total number of pixels (width * height)
   * @returns Session ID for tracking
   */
  startRender(totalChunks: number, totalPixels: number): string {
    this.sessionCounter++;
    const sessionId = `render-${Date.now()}-${this.sessionCounter}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      startTime: this.now(),
      totalChunks,
      chunkMetrics: [],
      totalPixels,
    });

    return sessionId;
  }

  /**
   * Records completion of a chunk.
   *
   * @param computeTime - Milliseconds from dispatch to result
   */
  recordChunk(sessionId: string, chunkIndex: number, computeTime: number, pixels: number): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown session ${sessionId}`);
      return;
    }

    session.chunkMetrics.push({ chunkIndex, computeTime, pixels });
  }

  /**
   * Ends a render session and calculates final metrics.
   *
   * @throws Error if the session is unknown or already ended
   */
  endRender(sessionId: string): RenderSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = this.now();
    const duration = endTime - session.startTime;
    const chunkTimes = session.chunkMetrics.map((m) => m.computeTime);

    const averageChunkTime =
      chunkTimes.length > 0 ? chunkTimes.reduce((a, b) => a + b, 0) / chunkTimes.length : 0;
    const slowestChunkTime = chunkTimes.length > 0 ? Math.max(...chunkTimes) : 0;
    const pixelsPerSecond = duration > 0 ? (session.totalPixels / duration) * 1000 : 0;

    const metrics: RenderSessionMetrics = {
      sessionId,
      startTime: session.startTime,
      endTime,
      duration,
      totalChunks: session.totalChunks,
      completedChunks: session.chunkMetrics.length,
      totalPixels: session.totalPixels,
      pixelsPerSecond,
      averageChunkTime,
      slowestChunkTime,
    };

    // Move to history
    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(sessionId);

    return metrics;
  }

  /**
   * Drops an active session without recording it, e.g. after a failed render.
   */
  abandonRender(sessionId: string): void {
    this.activeSessions.delete(sessionId);
  }

  /**
   * Gets current progress of an active session.
   *
   * @returns Progress percentage (0-100) or null if session not found
   */
  getProgress(sessionId: string): number | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return null;
    }

    return session.totalChunks > 0 ? (session.chunkMetrics.length / session.totalChunks) * 100 : 0;
  }

  getLastRenderMetrics(): RenderSessionMetrics | null {
    if (this.completedSessions.length === 0) {
      return null;
    }
    return this.completedSessions[this.completedSessions.length - 1];
  }

  /**
   * Gets summary statistics across all completed renders.
   */
  getStats(): {
    totalRenders: number;
    averageDuration: number;
    averagePixelsPerSecond: number;
  } {
    if (this.completedSessions.length === 0) {
      return {
        totalRenders: 0,
        averageDuration: 0,
        averagePixelsPerSecond: 0,
      };
    }

    const totalDuration = this.completedSessions.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = this.completedSessions.reduce((sum, m) => sum + m.pixelsPerSecond, 0);

    return {
      totalRenders: this.completedSessions.length,
      averageDuration: totalDuration / this.completedSessions.length,
      averagePixelsPerSecond: totalPixelsPerSecond / this.completedSessions.length,
    };
  }

  getHistory(): RenderSessionMetrics[] {
    return [...this.completedSessions];
  }

  clearHistory(): void {
    this.completedSessions = [];
  }

  /**
   * Sets the maximum number of sessions to keep in history.
   */
  setMaxHistorySize(size: number): void {
    this.maxHistorySize = size;
    while (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }
  }
}
