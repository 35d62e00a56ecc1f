import stringWidth from "string-width";
import { wmoSymbol } from "../forecast/wmoCode.js";

export const MISSING = "-";

/**
 * Weather emoji render 1 or 2 columns wide depending on the glyph. Padding
 * narrow ones here keeps the space right after the glyph, where generic
 * column padding would put it on the other side.
 */
export function wmoCellSymbol(code: number | null, hour: number): string {
  if (code === null) return MISSING;
  const sym = wmoSymbol(code, hour);
  return stringWidth(sym) === 1 ? `${sym} ` : sym;
}

// Half away from zero, and never "-0".
function roundHalfAway(n: number): number {
  const r = Math.sign(n) * Math.round(Math.abs(n));
  return r === 0 ? 0 : r;
}

export function formatTemp(temp: number | null): string {
  if (temp === null) return MISSING;
  return `${roundHalfAway(temp)}°`;
}

export function formatPrecip(precip: number | null): string {
  if (precip === null) return MISSING;
  if (precip === 0) return "";
  return precip < 5 ? `${precip.toFixed(1)}mm` : `${precip.toFixed(0)}mm`;
}

/** ["a", "a", "b", "a"] → ["a", "", "b", "a"] */
export function dedupConsecutive(values: string[]): string[] {
  return values.map((v, i) => (i > 0 && values[i - 1] === v ? "" : v));
}
