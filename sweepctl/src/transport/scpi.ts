/** Small helpers for SCPI text traffic. */

/** Strip NUL padding and surrounding whitespace from a raw response. */
export function cleanResponse(raw: string): string {
  return raw.replace(/\x00/g, "").trim();
}

/** Parse a numeric response; NaN when the instrument sent something else. */
export function parseScpiNumber(value: string): number {
  const text = cleanResponse(value);
  if (text.length === 0) return Number.NaN;
  const n = Number(text);
  return Number.isFinite(n) ? n : Number.NaN;
}

/** Render a number for a command argument without float noise (0.30000000000000004 → 0.3). */
export function formatScpiNumber(value: number): string {
  return String(Math.round(value * 1e6) / 1e6);
}

/** True when a SYSTem:ERRor? response reports an empty error queue. */
export function isNoError(response: string): boolean {
  const text = cleanResponse(response);
  return text === "0" || text === "OK" || text.startsWith("0,") || text.startsWith("+0,");
}

/** True for the usual "on" renderings of a boolean state query. */
export function isOnState(response: string): boolean {
  const text = cleanResponse(response).toUpperCase();
  return text === "1" || text === "ON" || text === "OK";
}
