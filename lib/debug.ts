export const REDACTED = '***REDACTED***';

const SECRET_HEADERS = ['api-key'];

export type LogFn = (...args: unknown[]) => void;

export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const masked = { ...headers };
  for (const name of SECRET_HEADERS) {
    if (name in masked) masked[name] = REDACTED;
  }
  return masked;
}

/**
 * Dumps an outgoing request to stdout. The api key never leaves this function unmasked.
 * @param label Printed after "DEBUG:", e.g. "SEARCH POST".
 * @param bodyLabel Name used for the JSON body line ("body" or "payload").
 */
export function debugRequest(
  log: LogFn,
  label: string,
  url: string,
  headers: Record<string, string>,
  bodyLabel: string,
  body: unknown,
): void {
  log(`DEBUG: ${label} ${url}`);
  log(`DEBUG: headers: ${JSON.stringify(redactHeaders(headers))}`);
  log(`DEBUG: ${bodyLabel}: ${JSON.stringify(body, null, 2)}`);
}
