/**
 * "1.2" -> "1.3", "2.0.9" -> "2.0.10"; anything else gets ".1" appended ("1" -> "1.1", "1.x" -> "1.x.1").
 */
export function incrementVersion(version: string): string {
  const parts = version.split('.');
  const last = parts[parts.length - 1];
  if (parts.length >= 2 && last !== undefined && /^\d+$/.test(last)) {
    parts[parts.length - 1] = String(BigInt(last) + 1n);
    return parts.join('.');
  }
  return `${version}.1`;
}
