/**
 * Cache key for a coordinate pair. Every caller must use the same precision,
 * otherwise "12.97" and "12.970000" would land on separate entries.
 */
export function coordinateKey(lat: number, lon: number, precision: number): string {
  return `${fixed(lat, precision)},${fixed(lon, precision)}`;
}

function fixed(value: number, precision: number): string {
  const text = value.toFixed(precision);
  // -0.0000001 rounds to "-0.000000"
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}
