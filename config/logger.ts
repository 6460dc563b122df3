import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const level = process.env.LOG_LEVEL ?? "info";

// stdout belongs to the interactive prompt, logs go to stderr
export const logger = isDev
  ? pino({
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          singleLine: true,
          destination: 2,
        },
      },
      level,
    })
  : pino({ level }, pino.destination(2));
