/**
 * Encodes a caller-supplied value as a single key segment. The result never
 * contains `:`, so keys joined from segments cannot collide across tenants.
 */
export function keySegment(value: string): string {
  return encodeURIComponent(value);
}

export function joinKey(...segments: string[]): string {
  return segments.map(keySegment).join(':');
}
