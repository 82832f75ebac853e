import { Decimal } from "decimal.js";

import type { RasterDimensions, Viewport } from "../fractals/types.js";
import type { Complex } from "./complex.js";
import { ConfigurationError } from "./errors.js";
import { validateDimensions } from "./validation.js";

// Half-height of the view at zoom 1 (the plane is 4 units tall)
const INITIAL_FRACTAL_VIEW_HALF_HEIGHT = 2;

/**
 * Decimal constructor used for viewport arithmetic. Configuration strings are
 * stored exactly; derived values (zoom, pan, scale) keep 50 significant digits
 * before they are reduced to native numbers for per-pixel work.
 */
export const ViewportDecimal = Decimal.clone({ precision: 50 });

export type ViewportInput = {
  center: { re: Decimal.Value; im: Decimal.Value };
  halfHeight: Decimal.Value;
};

const toDecimal = (value: Decimal.Value, field: string): Decimal => {
  let result: Decimal;
  try {
    result = new ViewportDecimal(value);
  } catch (error) {
    throw new ConfigurationError(`${field} is not a number: ${String(value)}`, { cause: error });
  }
  if (!result.isFinite()) {
    throw new ConfigurationError(`${field} must be finite, got ${result.toString()}`);
  }
  return result;
};

/**
 * Builds an immutable viewport, rejecting a half-height that is not strictly positive.
 */
export function createViewport(input: ViewportInput): Viewport {
  const halfHeight = toDecimal(input.halfHeight, "viewport.halfHeight");
  if (!halfHeight.gt(0)) {
    throw new ConfigurationError(`viewport.halfHeight must be positive, got ${halfHeight.toString()}`);
  }

  return Object.freeze({
    center: Object.freeze({
      re: toDecimal(input.center.re, "viewport.center.re"),
      im: toDecimal(input.center.im, "viewport.center.im"),
    }),
    halfHeight,
  });
}

/**
 * Viewport for a zoom factor, where zoom 1 shows the plane 4 units tall.
 */
export function viewportFromZoom(center: ViewportInput["center"], zoom: Decimal.Value): Viewport {
  const zoomDecimal = toDecimal(zoom, "zoom");
  if (!zoomDecimal.gt(0)) {
    throw new ConfigurationError(`zoom must be positive, got ${zoomDecimal.toString()}`);
  }
  return createViewport({
    center,
    halfHeight: new ViewportDecimal(INITIAL_FRACTAL_VIEW_HALF_HEIGHT).div(zoomDecimal),
  });
}

/** Half of the visible real-axis span: halfHeight * width / height. */
export function viewportHalfWidth(viewport: Viewport, dimensions: RasterDimensions): Decimal {
  return new ViewportDecimal(viewport.halfHeight).times(dimensions.width).div(dimensions.height);
}

/** Plane units per pixel, in viewport precision. */
const pixelScale = (viewport: Viewport, dimensions: RasterDimensions): Decimal =>
  new ViewportDecimal(viewport.halfHeight).times(2).div(dimensions.height);

/** Signed pixel offset from the raster center along one axis; 0 on a single-pixel axis. */
const centerOffset = (pixel: number, size: number): Decimal =>
  size === 1 ? new ViewportDecimal(0) : new ViewportDecimal(pixel).minus(new ViewportDecimal(size).div(2));

/**
 * Affine map between raster pixels and the complex plane.
 *
 * Row 0 is the top of the image, so the imaginary axis grows upwards while
 * rows grow downwards. All members are pure and safe to call concurrently.
 */
export interface PlaneTransform {
  /** Plane units per pixel */
  readonly scale: number;
  realAt(col: number): number;
  imagAt(row: number): number;
  pixelToComplex(col: number, row: number): Complex;
  /** Inverse of pixelToComplex; a single-pixel axis always maps back to pixel 0. */
  complexToPixel(z: Complex): { col: number; row: number };
}

export function createPlaneTransform(viewport: Viewport, dimensions: RasterDimensions): PlaneTransform {
  validateDimensions(dimensions);

  const scale = pixelScale(viewport, dimensions).toNumber();
  if (!(scale > 0) || !Number.isFinite(scale)) {
    throw new ConfigurationError(
      `viewport.halfHeight ${viewport.halfHeight.toString()} is outside native floating-point range ` +
        `for a ${dimensions.width}x${dimensions.height} raster`
    );
  }

  const centerRe = viewport.center.re.toNumber();
  const centerIm = viewport.center.im.toNumber();
  if (!Number.isFinite(centerRe) || !Number.isFinite(centerIm)) {
    throw new ConfigurationError(
      `viewport.center (${viewport.center.re.toString()}, ${viewport.center.im.toString()}) ` +
        `is outside native floating-point range`
    );
  }
  const halfCols = dimensions.width / 2;
  const halfRows = dimensions.height / 2;
  const singleCol = dimensions.width === 1;
  const singleRow = dimensions.height === 1;

  const realAt = (col: number): number => (singleCol ? centerRe : centerRe + (col - halfCols) * scale);
  const imagAt = (row: number): number => (singleRow ? centerIm : centerIm - (row - halfRows) * scale);

  return {
    scale,
    realAt,
    imagAt,
    pixelToComplex: (col, row) => ({ re: realAt(col), im: imagAt(row) }),
    complexToPixel: (z) => ({
      col: singleCol ? 0 : (z.re - centerRe) / scale + halfCols,
      row: singleRow ? 0 : (centerIm - z.im) / scale + halfRows,
    }),
  };
}

/**
 * Zooms by `factor` (> 1 zooms in) keeping the plane point under `anchor`
 * fixed on screen. The anchor defaults to the raster center.
 */
export function zoomViewport(
  viewport: Viewport,
  dimensions: RasterDimensions,
  factor: number,
  anchor: { col: number; row: number } = { col: dimensions.width / 2, row: dimensions.height / 2 }
): Viewport {
  validateDimensions(dimensions);
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new ConfigurationError(`zoom factor must be a positive finite number, got ${factor}`);
  }

  const oldScale = pixelScale(viewport, dimensions);
  const halfHeight = new ViewportDecimal(viewport.halfHeight).div(factor);
  const newScale = halfHeight.times(2).div(dimensions.height);
  const shift = oldScale.minus(newScale);

  return createViewport({
    center: {
      re: new ViewportDecimal(viewport.center.re).plus(centerOffset(anchor.col, dimensions.width).times(shift)),
      im: new ViewportDecimal(viewport.center.im).minus(centerOffset(anchor.row, dimensions.height).times(shift)),
    },
    halfHeight,
  });
}

/**
 * Moves the view so that the pixel (width/2 + deltaCols, height/2 + deltaRows)
 * becomes the new center.
 */
export function panViewport(
  viewport: Viewport,
  dimensions: RasterDimensions,
  deltaCols: number,
  deltaRows: number
): Viewport {
  validateDimensions(dimensions);
  const scale = pixelScale(viewport, dimensions);

  return createViewport({
    center: {
      re: new ViewportDecimal(viewport.center.re).plus(scale.times(deltaCols)),
      im: new ViewportDecimal(viewport.center.im).minus(scale.times(deltaRows)),
    },
    halfHeight: viewport.halfHeight,
  });
}
