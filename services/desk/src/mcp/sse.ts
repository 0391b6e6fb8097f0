/** Formats one server-sent event carrying a JSON payload. */
export function sseEvent(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Returns the first `data:` line of an event-stream body that parses as JSON,
 * or `undefined` when there is none.
 */
export function extractSseJson(body: string): unknown {
  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith('data:')) continue;
    try {
      return JSON.parse(line.slice('data:'.length).trim());
    } catch {
      continue;
    }
  }
  return undefined;
}
