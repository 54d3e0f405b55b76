/**
 * Reporting channel
 * Human-readable progress lines from the pipeline to its host
 */

import type { Logger } from "./logger";
import { toError } from "./errors";

export interface Reporter {
  report(message: string): void;
}

/**
 * Wrap a reporter so its failures never reach the pipeline
 * Faults are logged through `logger` and discarded
 */
export function guardReporter(reporter: Reporter, logger: Logger): Reporter {
  return {
    report(message: string): void {
      try {
        reporter.report(message);
      } catch (error) {
        logger.error("Reporter failed to handle message", toError(error));
      }
    },
  };
}

/**
 * Fallback when the host supplies no reporter
 */
export function loggerReporter(logger: Logger): Reporter {
  return {
    report(message: string): void {
      logger.info(message);
    },
  };
}

/**
 * Reporter that keeps every message, used by hosts that render a log view
 */
export class MessageLog implements Reporter {
  readonly messages: string[] = [];

  report(message: string): void {
    this.messages.push(message);
  }
}
