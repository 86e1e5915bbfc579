import pino from "pino";
import type { TransportTargetOptions } from "pino";
import { config } from "./config.js";

// stderr gets human-readable output; stdout stays free for command results
const targets: TransportTargetOptions[] = [
  {
    target: "pino-pretty",
    options: {
      destination: 2,
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
    level: config.logging.level,
  },
];

if (config.logging.file) {
  targets.push({
    target: "pino/file",
    options: {
      destination: config.logging.file,
      mkdir: true,
    },
    level: "debug", // file gets everything
  });
}

export const logger = pino(
  {
    level: "debug", // targets filter individually
    base: { service: "trial-scout" },
  },
  pino.transport({ targets }),
);

export const logEval = logger.child({ subsystem: "eval" });
export const logStore = logger.child({ subsystem: "store" });
export const logCli = logger.child({ subsystem: "cli" });
