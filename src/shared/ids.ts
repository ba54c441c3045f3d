let sequence = 0;

/** Short unique id for connections and operations, e.g. `conn-lq3k9x2a-1`. */
export function genId(prefix: string): string {
  sequence += 1;
  return `${prefix}-${Date.now().toString(36)}-${sequence.toString(36)}`;
}
