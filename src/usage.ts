/**
 * Usage record sinks.
 *
 * Emission is fire-and-forget: a sink that throws is logged and skipped, it
 * never changes what the client receives.
 *
 * @packageDocumentation
 */

import { errorMessage } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import type { UsageRecord, UsageSink } from './types.js';

/**
 * Writes each record to the `requests` logger.
 */
export class LoggingUsageSink implements UsageSink {
  constructor(private readonly logger: Logger = defaultLogger.child('requests')) {}

  emit(record: UsageRecord): void {
    const fields = { ...record };
    switch (record.outcome) {
      case 'completed':
        this.logger.info('Request completed', fields);
        break;
      case 'aborted':
        this.logger.warn('Request aborted', fields);
        break;
      default:
        this.logger.error('Request failed', fields);
    }
  }
}

/**
 * Combine sinks. Each one is isolated from the others' failures.
 */
export function fanOut(sinks: UsageSink[], logger: Logger = defaultLogger): UsageSink {
  return {
    emit(record) {
      for (const sink of sinks) {
        try {
          sink.emit(record);
        } catch (err) {
          logger.error('Usage sink failed', { requestId: record.requestId, cause: errorMessage(err) });
        }
      }
    },
  };
}
