import { ConsoleLogger, Logger, type LogLevel } from "@nestjs/common";

const LEVEL_ORDER: LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LEVEL_ORDER.findIndex((candidate) => candidate === level);
  return LEVEL_ORDER.slice(0, index >= 0 ? index + 1 : LEVEL_ORDER.indexOf("log") + 1);
}

/** Keeps stdout free for report lines. */
export class StderrConsoleLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, "stderr");
  }
}

export function installLogger(level: string | undefined = process.env.LOG_LEVEL): void {
  const logger = new StderrConsoleLogger();
  logger.setLogLevels(resolveLogLevels(level));
  Logger.overrideLogger(logger);
}
