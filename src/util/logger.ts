import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for both local runs and AWS Lambda.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs for CloudWatch
 * - Jest: silent, and no transport worker is started
 */
const baseOptions: LoggerOptions = {
  level: isTest()
    ? "silent"
    : process.env.LOG_LEVEL || (isProduction() ? "info" : "debug"),
  base: {
    service: "nickel-bulletin",
    stage: getStage(),
  },
  redact: {
    paths: ["*.secret", "*.token", "webhookUrl", "*.webhookUrl"],
    censor: "[REDACTED]",
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const prettyTransport: LoggerOptions["transport"] = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    singleLine: false,
    ignore: "pid,hostname",
  },
};

const usePretty = isLocal() && !isProduction() && !isTest();

const rootLogger: Logger = pino({
  ...baseOptions,
  ...(usePretty ? { transport: prettyTransport } : {}),
});

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with AWS Lambda request context fields.
 * Use inside Lambda handlers when `context` is available.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}

export default rootLogger;
