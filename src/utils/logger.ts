export type LogLevel = "info" | "warn" | "error";

export function logger(message: string, level: LogLevel = "info"): void {
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}
