/**
 * Helpers for reading loosely-shaped JSON coming back from models and files.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Remove a surrounding ```json ... ``` (or bare ```) fence if present. */
export function stripJsonFences(raw: string): string {
  const s = raw.trim();
  const fenced = s.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/i);
  if (fenced?.[1] !== undefined) return fenced[1].trim();

  // Truncated reply: opening fence with no closing one
  const open = s.match(/^```(?:json)?\s*\n([\s\S]+)$/i);
  if (open?.[1] !== undefined) return open[1].trim();

  return s;
}

export function parseJsonObject(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(stripJsonFences(raw));
  if (!isRecord(parsed)) throw new Error("Expected a JSON object");
  return parsed;
}
