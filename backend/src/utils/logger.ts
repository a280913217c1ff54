import pino, { type Logger, type LoggerOptions } from "pino";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

const REDACT_PATHS = [
  "secretAccessKey",
  "*.secretAccessKey",
  "config.secretAccessKey",
  "adminSecretAccessKey",
  "tenantSecretAccessKey",
  "password",
  "*.password",
];

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  base: { service: "stowage" },
  redact: { paths: REDACT_PATHS, censor: "****" },
  ...(isProd || isTest
    ? {}
    : {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            singleLine: true,
          },
        },
      }),
};

function build(): Logger {
  return pino(options);
}

type GlobalWithLogger = typeof globalThis & { __STOWAGE_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__STOWAGE_LOGGER__ ?? (g.__STOWAGE_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
