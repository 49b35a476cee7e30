import winston from "winston";
import path from "path";

const LOG_DIR = path.resolve(process.cwd(), "logs");
const IS_TEST = process.env.NODE_ENV === "test";

const timestampFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message }) => {
    return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;
  }),
);

const fileTransports: winston.transport[] = IS_TEST
  ? []
  : [
      // errors + fetch failures only
      new winston.transports.File({
        filename: path.join(LOG_DIR, "error.log"),
        level: "error",
        format: timestampFormat,
      }),
      // everything
      new winston.transports.File({
        filename: path.join(LOG_DIR, "combined.log"),
        format: timestampFormat,
      }),
    ];

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: IS_TEST,
  transports: [
    ...fileTransports,
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.printf(({ timestamp, message }) => {
          return `[${String(timestamp)}] ${String(message)}`;
        }),
      ),
    }),
  ],
});

export default logger;
