export interface LinearScale {
  (value: number): number;
  readonly domain: readonly [number, number];
}

/** Widens a zero-width domain so a single value still maps to the middle of the range. */
export function paddedDomain(min: number, max: number): [number, number] {
  if (max > min) {
    return [min, max];
  }
  const pad = min === 0 ? 0.5 : Math.abs(min) * 0.1;
  return [min - pad, max + pad];
}

export function createLinearScale(
  min: number,
  max: number,
  rangeStart: number,
  rangeEnd: number,
): LinearScale {
  const [d0, d1] = paddedDomain(min, max);
  const ratio = (rangeEnd - rangeStart) / (d1 - d0);
  const scale = (value: number): number => rangeStart + (value - d0) * ratio;
  return Object.assign(scale, { domain: [d0, d1] as const });
}

function niceStep(span: number, count: number): number {
  const raw = span / Math.max(count, 1);
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  const tolerance = 1e-9;
  if (residual <= 1 + tolerance) return magnitude;
  if (residual <= 2 + tolerance) return 2 * magnitude;
  if (residual <= 5 + tolerance) return 5 * magnitude;
  return 10 * magnitude;
}

/** Round tick values that fall inside [min, max]. */
export function niceTicks(min: number, max: number, count = 5): number[] {
  const [lo, hi] = paddedDomain(min, max);
  const step = niceStep(hi - lo, count);
  const first = Math.ceil(lo / step - 1e-9);
  const last = Math.floor(hi / step + 1e-9);
  const ticks: number[] = [];
  for (let k = first; k <= last; k++) {
    // Drops float noise such as 0.30000000000000004.
    ticks.push(Number((k * step).toPrecision(12)));
  }
  return ticks;
}

export function formatTick(value: number): string {
  if (value === 0) return '0';
  const abs = Math.abs(value);
  if (abs >= 1e4 || abs < 1e-3) return value.toExponential(1);
  return String(Number(value.toPrecision(4)));
}
