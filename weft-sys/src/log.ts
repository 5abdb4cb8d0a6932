/**
 * Format log message with timestamp
 */
export function log(message: string, source = "web") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

/**
 * Log an error with its stack trace
 */
export function logError(message: string, error: unknown, source = "web") {
  const detail = error instanceof Error ? error.stack || error.message : String(error);
  console.error(`${timestamp()} [${source}] ${message}\n${detail}`);
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}
