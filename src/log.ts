// Diagnostics go to stderr as one JSON object per line so stdout stays
// machine-readable.

export function logError(entry: { error: string; detail?: unknown; hint?: string; status?: number }, pretty = false): void {
  console.error(pretty ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
}

export function logDebug(entry: Record<string, unknown>): void {
  console.error(JSON.stringify(entry));
}
