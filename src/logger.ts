import process from "node:process";
import pino, { type Logger } from "pino";

function createLogger(): Logger {
  const level = process.env.LOG_LEVEL ?? "info";

  if (process.stderr.isTTY && level !== "silent") {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2, ignore: "pid,hostname" },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

export const logger = createLogger();
