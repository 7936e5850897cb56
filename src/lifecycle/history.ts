/** One history line: `<timestamp> <action>[ <detail>]`. */
export function historyEvent(now: string, action: string, detail?: string | null): string {
  return detail ? `${now} ${action} ${detail}` : `${now} ${action}`;
}

/** Append-only: returns a new list, never edits the old one. */
export function appendHistory(history: readonly string[], event: string): string[] {
  return [...history, event];
}
