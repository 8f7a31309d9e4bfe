/** Number of decimals a step carries: 0.01 → 2, 1e-7 → 7, 1 → 0. */
export function stepDecimals(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;
  const text = step.toString();
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent) return Number(exponent[1]);
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
}

function stepUnits(value: number, step: number): number {
  // 0.15 / 0.01 is 14.999999999999998 in binary floating point
  return Number((value / step).toFixed(9));
}

/** Largest multiple of step that does not exceed value. A non-positive step returns value unchanged. */
export function floorToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const units = Math.floor(stepUnits(value, step));
  return Number((units * step).toFixed(stepDecimals(step)));
}

/** Nearest multiple of step. */
export function roundToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const units = Math.round(stepUnits(value, step));
  return Number((units * step).toFixed(stepDecimals(step)));
}
