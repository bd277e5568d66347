const DEGENERATE_EPSILON = 1e-12;
const EXPONENT_LIMIT = 50;

export interface LinearFit {
  intercept: number;
  slope: number;
}

/** Ordinary least squares. Degenerate input (n < 2, zero variance in x) gives (0, 0). */
export function linreg(x: number[], y: number[]): LinearFit {
  const n = x.length;
  if (n < 2) return { intercept: 0, slope: 0 };

  let sx = 0;
  let sy = 0;
  let sxy = 0;
  let sx2 = 0;
  for (let i = 0; i < n; i++) {
    sx += x[i];
    sy += y[i];
    sxy += x[i] * y[i];
    sx2 += x[i] * x[i];
  }

  const denom = n * sx2 - sx * sx;
  if (Math.abs(denom) < DEGENERATE_EPSILON) return { intercept: 0, slope: 0 };

  const slope = (n * sxy - sx * sy) / denom;
  const intercept = (sy - slope * sx) / n;
  return { intercept, slope };
}

/** Coefficient of determination; 0 when the actual values have no variance. */
export function rSquared(actual: number[], predicted: number[]): number {
  if (actual.length === 0) return 0;
  const mean = actual.reduce((a, b) => a + b, 0) / actual.length;
  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < actual.length; i++) {
    ssTot += (actual[i] - mean) ** 2;
    ssRes += (actual[i] - predicted[i]) ** 2;
  }
  if (ssTot < DEGENERATE_EPSILON) return 0;
  return 1 - ssRes / ssTot;
}

export function logistic(t: number, L: number, r: number, tMid: number): number {
  const ex = r * (t - tMid);
  if (ex > EXPONENT_LIMIT) return L;
  if (ex < -EXPONENT_LIMIT) return 0;
  return L / (1 + Math.exp(-ex));
}

export function logisticDeriv(t: number, L: number, r: number, tMid: number): number {
  const ex = r * (t - tMid);
  if (Math.abs(ex) > EXPONENT_LIMIT) return 0;
  const sig = 1 / (1 + Math.exp(-ex));
  return L * r * sig * (1 - sig);
}

/** Integer range [start, stop) like a for-loop bound; empty when start >= stop. */
export function intRange(start: number, stop: number, step: number = 1): number[] {
  const out: number[] = [];
  for (let v = start; v < stop; v += step) out.push(v);
  return out;
}

export interface LogisticGrid {
  L: number[];
  /** Growth rates, in tenths. */
  r10: number[];
  /** Midpoints, in tenths of a period. */
  tMid10: number[];
}

export interface LogisticFit {
  L: number;
  r: number;
  tMid: number;
  rSquared: number;
}

/**
 * Exhaustive grid search for the logistic curve with the highest R².
 * Ties keep the first candidate in L, r, t_mid order, so the result is
 * deterministic. Returns null for an empty grid.
 */
export function fitLogistic(t: number[], y: number[], grid: LogisticGrid): LogisticFit | null {
  let best: LogisticFit | null = null;
  const pred = new Array<number>(t.length);

  for (const L of grid.L) {
    for (const r10 of grid.r10) {
      const r = r10 / 10;
      for (const tMid10 of grid.tMid10) {
        const tMid = tMid10 / 10;
        for (let i = 0; i < t.length; i++) pred[i] = logistic(t[i], L, r, tMid);
        const r2 = rSquared(y, pred);
        if (best === null || r2 > best.rSquared) {
          best = { L, r, tMid, rSquared: r2 };
        }
      }
    }
  }

  return best;
}

export function round(value: number, decimals: number = 0): number {
  return parseFloat(value.toFixed(decimals));
}
