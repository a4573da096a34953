/**
 * Structured logging for the integration.
 * Writes through `debug` namespaces and mirrors every entry to Sentry
 * (logs, breadcrumbs, and captured events for warnings and errors).
 */

import * as Sentry from "@sentry/node";
import debug, { type Debugger } from "debug";
import { mapDict } from "./utility.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogExtra = Record<string, unknown>;

export type DebugInstances = Record<LogLevel, Debugger>;

const NAMESPACE = "govee";

export class Logger {
  private readonly component: string;
  private readonly loggers: DebugInstances;

  constructor(component: string, loggers: DebugInstances) {
    this.component = component;
    this.loggers = loggers;
  }

  debug(message: string, extra?: LogExtra): void {
    this.log(this.loggers.debug, message, this.withScopeTags(extra));
    this.addBreadcrumb("debug", message, extra);
    Sentry.logger.debug(message, { component: this.component, ...extra });
  }

  info(message: string, extra?: LogExtra): void {
    this.log(this.loggers.info, message, this.withScopeTags(extra));
    this.addBreadcrumb("info", message, extra);
    Sentry.logger.info(message, { component: this.component, ...extra });
  }

  warn(message: string, extra?: LogExtra): void {
    this.log(this.loggers.warn, message, this.withScopeTags(extra));
    this.addBreadcrumb("warning", message, extra);
    Sentry.logger.warn(message, { component: this.component, ...extra });
    Sentry.captureMessage(message, this.captureContext("warning", extra));
  }

  error(message: string, error?: unknown, extra?: LogExtra): void {
    if (error !== undefined) {
      this.loggers.error("%s %O", message, error);
    } else {
      this.log(this.loggers.error, message, this.withScopeTags(extra));
    }

    this.addBreadcrumb("error", message, extra);
    Sentry.logger.error(message, {
      component: this.component,
      ...extra,
      error: error instanceof Error ? error.message : error,
    });

    if (error !== undefined) {
      Sentry.captureException(error, this.captureContext("error", extra));
    } else {
      Sentry.captureMessage(message, this.captureContext("error", extra));
    }
  }

  /**
   * Uses "%s %O" when extra data is present, "%s" when not
   */
  private log(logFn: Debugger, message: string, extra?: LogExtra): void {
    if (extra !== undefined && Object.keys(extra).length > 0) {
      logFn("%s %O", message, extra);
    } else {
      logFn("%s", message);
    }
  }

  /**
   * Tags set on the current Sentry scope (device id, command) are appended
   * to the console output with a `tag.` prefix.
   */
  private withScopeTags(extra: LogExtra = {}): LogExtra {
    const { tags } = Sentry.getCurrentScope().getScopeData();
    return {
      ...extra,
      ...mapDict(tags, (key, value) => [`tag.${key}`, value]),
    };
  }

  private captureContext = (
    level: Sentry.SeverityLevel,
    extra?: LogExtra
  ): Sentry.CaptureContext => ({
    level,
    tags: { component: this.component },
    ...(extra && Object.keys(extra).length > 0 ? { extra } : {}),
  });

  private addBreadcrumb = (
    level: Sentry.SeverityLevel,
    message: string,
    data: LogExtra | undefined
  ) =>
    Sentry.addBreadcrumb({
      type: level === "debug" || level === "error" ? level : "default",
      level,
      category: this.component.replaceAll(":", "."),
      message,
      ...(data ? { data } : {}),
    });
}

/**
 * Creates a logger whose output goes to `govee:${component}:${level}`.
 * Enable with e.g. `DEBUG=govee:*`.
 */
export const createLogger = (component: string) =>
  new Logger(component, {
    debug: debug(`${NAMESPACE}:${component}:debug`),
    info: debug(`${NAMESPACE}:${component}:info`),
    warn: debug(`${NAMESPACE}:${component}:warn`),
    error: debug(`${NAMESPACE}:${component}:error`),
  });
