export type LogStream = "stdout" | "stderr";

export function formatLogLine(message: string, source: string, at = new Date()): string {
  const formattedTime = at.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  return `${formattedTime} [${source}] ${message}`;
}

/**
 * Time-prefixed console line. The CLI writes through `stderr` so stdout carries
 * only the report JSON.
 */
export function log(message: string, source = "sandy", stream: LogStream = "stdout") {
  const line = formatLogLine(message, source);
  if (stream === "stderr") {
    console.error(line);
    return;
  }
  console.log(line);
}
