function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

/**
 * Prefix a message with a local "[YYYY-MM-DD HH:MM:SS]" timestamp
 */
export function formatLogLine(message: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `[${date} ${time}] ${message}`;
}

export function log(message: string): void {
  console.log(formatLogLine(message));
}
