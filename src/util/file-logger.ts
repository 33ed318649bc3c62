import fs from "node:fs";
import path from "node:path";

export type Logger = Pick<Console, "log" | "error">;

// Failures already reach the user through the CLI boundary, so nothing is echoed here.
export const SILENT_LOGGER: Logger = {
  log: () => undefined,
  error: () => undefined
};

const serialize = (value: unknown): string => {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

export const createLogger = (logFilePath: string | undefined, scope: string): Logger => {
  if (!logFilePath) {
    return SILENT_LOGGER;
  }

  const resolvedPath = path.resolve(logFilePath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

  const write = (level: "INFO" | "ERROR", values: unknown[]): void => {
    const line = `${new Date().toISOString()} [${level}] ${scope}[${process.pid}] ${values
      .map((value) => serialize(value))
      .join(" ")}\n`;
    fs.appendFileSync(resolvedPath, line, "utf8");
  };

  return {
    log: (...values: unknown[]) => {
      write("INFO", values);
    },
    error: (...values: unknown[]) => {
      write("ERROR", values);
    }
  };
};
