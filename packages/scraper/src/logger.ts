/**
 * JSON-line logging. Every line is a single object with an `event` field so
 * runs can be piped into `jq` or any log shipper.
 */
export type LogFields = Record<string, unknown>;

function line(event: string, fields: LogFields): string {
  return JSON.stringify({ event, ...fields });
}

export function logEvent(event: string, fields: LogFields = {}): void {
  console.log(line(event, fields));
}

export function logWarn(event: string, fields: LogFields = {}): void {
  console.error(line(event, { level: "warn", ...fields }));
}

export function logError(event: string, err: unknown, fields: LogFields = {}): void {
  console.error(line(event, { level: "error", ...fields, error: describeError(err) }));
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
