export function toJsonPreview(value: unknown): string {
  let preview = "";
  try {
    const json = JSON.stringify(value);
    preview = json && json.length > 256 ? `${json.slice(0, 256)}...` : (json ?? "");
  } catch {
    preview = String(value);
  }
  return preview || "(empty)";
}

export function asObject(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

export function toInvalidDataMessage(subject: string, message: string, data: unknown): string {
  return `Invalid ${subject} (${message}): ${toJsonPreview(data)}`;
}

export function parseJsonText(subject: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid ${subject} (not JSON: ${reason})`);
  }
}
