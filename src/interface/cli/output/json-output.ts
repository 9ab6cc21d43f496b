/**
 * JSON output mode for --json flag
 */

export function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function printJson(data: unknown): void {
  process.stdout.write(toJson(data) + '\n');
}

export function printJsonError(error: {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
}): void {
  printJson({ error });
}
