/**
 * Progress logging goes to stderr so stdout stays clean for command output
 * (`history --format json`, the status report).
 */

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function log(message: string): void {
  console.error(message);
}

export function warn(message: string): void {
  console.error(`WARN ${message}`);
}

export function debug(message: string): void {
  if (!verbose) return;
  console.error(`DEBUG ${message}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
