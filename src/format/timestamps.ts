import { isTimestampUnit } from "../constants.js";
import { InvalidTimestampUnit } from "../errors.js";

/**
 * Converts an engine offset (milliseconds) to the unit requested by the caller.
 *
 * - `ms` returns the engine value untouched
 * - `s` divides by 1000 without rounding
 * - `hms` renders `HH:MM:SS.mmm`, hours unbounded
 */
export function convertTimestamp(timestampMs: number, unit: string): number | string {
  if (!isTimestampUnit(unit)) {
    throw new InvalidTimestampUnit(unit);
  }
  switch (unit) {
    case "ms":
      return timestampMs;
    case "s":
      return timestampMs / 1000;
    case "hms":
      return fmtHms(timestampMs);
  }
}

function fmtHms(timestampMs: number): string {
  const total = Number.isFinite(timestampMs) ? Math.max(0, Math.floor(timestampMs)) : 0;
  const h = Math.floor(total / 3600000);
  const m = Math.floor((total % 3600000) / 60000);
  const s = Math.floor((total % 60000) / 1000);
  const msPart = total % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}.${pad3(msPart)}`;
}

function pad2(n: number) { return n.toString().padStart(2, "0"); }
function pad3(n: number) { return n.toString().padStart(3, "0"); }
