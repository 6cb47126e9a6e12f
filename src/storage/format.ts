const KIB = 1024;
const MIB = 1024 * 1024;

// Round half to even, so 0.25 -> 0.2 and 0.75 -> 0.8.
function roundHalfEven(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  if (diff > 0.5) return (floor + 1) / factor;
  if (diff < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

// Shortest decimal form, but never without a fractional digit: 2 -> "2.0".
function formatRounded(value: number, digits: number): string {
  const rounded = roundHalfEven(value, digits);
  return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
}

/** Display size: KB with one decimal below 1 MiB, MB with two decimals above. */
export function formatSize(bytes: number): string {
  if (bytes < MIB) {
    return `${formatRounded(bytes / KIB, 1)} KB`;
  }
  return `${formatRounded(bytes / MIB, 2)} MB`;
}
