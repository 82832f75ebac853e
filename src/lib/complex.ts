// ABOUTME: Complex-number arithmetic on plain { re, im } records
// ABOUTME: Used by orbit traps and viewport helpers; the escape-time loop expands its own arithmetic

export type Complex = {
  re: number;
  im: number;
};

export const ZERO: Complex = Object.freeze({ re: 0, im: 0 });

export function complex(re: number, im: number): Complex {
  return { re, im };
}

export function add(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function subtract(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

export function multiply(a: Complex, b: Complex): Complex {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  };
}

export function divide(a: Complex, b: Complex): Complex {
  const denom = b.re * b.re + b.im * b.im;
  return {
    re: (a.re * b.re + a.im * b.im) / denom,
    im: (a.im * b.re - a.re * b.im) / denom,
  };
}

/** Multiplies both components by a real factor. */
export function scale(z: Complex, factor: number): Complex {
  return { re: z.re * factor, im: z.im * factor };
}

export function magnitudeSquared(z: Complex): number {
  return z.re * z.re + z.im * z.im;
}

export function magnitude(z: Complex): number {
  return Math.sqrt(magnitudeSquared(z));
}

export function isFiniteComplex(z: Complex): boolean {
  return Number.isFinite(z.re) && Number.isFinite(z.im);
}

export function approxEqual(a: Complex, b: Complex, eps = 1e-10): boolean {
  return Math.abs(a.re - b.re) < eps && Math.abs(a.im - b.im) < eps;
}
