import type { LoggerService } from "@nestjs/common";
import type { Logger } from "pino";

/**
 * Routes Nest framework logs (module init, route mapping, exceptions) into pino.
 */
export class PinoLoggerService implements LoggerService {
  constructor(private readonly logger: Logger) {}

  log(message: unknown, context?: string) {
    this.logger.info({ context: context ?? "Nest" }, String(message));
  }

  error(message: unknown, trace?: string, context?: string) {
    this.logger.error({ context: context ?? "Nest", trace }, String(message));
  }

  warn(message: unknown, context?: string) {
    this.logger.warn({ context: context ?? "Nest" }, String(message));
  }

  debug(message: unknown, context?: string) {
    this.logger.debug({ context: context ?? "Nest" }, String(message));
  }

  verbose(message: unknown, context?: string) {
    this.logger.trace({ context: context ?? "Nest" }, String(message));
  }

  fatal(message: unknown, context?: string) {
    this.logger.fatal({ context: context ?? "Nest" }, String(message));
  }
}
