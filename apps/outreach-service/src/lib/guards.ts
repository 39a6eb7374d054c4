/**
 * Plain object check for untrusted JSON (arrays excluded)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
