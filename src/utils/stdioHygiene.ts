/**
 * MCP speaks JSON-RPC over stdout, and `parse` prints its JSON result there.
 * Send every log-level console method to stderr so nothing else lands on stdout.
 */

function logToStderr(...args: unknown[]): void {
  console.error(...args);
}

for (const method of ['log', 'info', 'debug'] as const) {
  if (console[method] !== logToStderr) console[method] = logToStderr;
}
