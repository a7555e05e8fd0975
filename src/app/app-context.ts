/**
 * Application context for background work.
 *
 * Jobs look up their dependencies here when they start instead of closing
 * over them, so a job picked up after shutdown began finds nothing and
 * does nothing.
 */

import { makeDeadlineAlertRenderer } from '../modules/deadline-alerts/index.js';

import type { CacheInvalidator } from '../infra/cache/index.js';
import type { EmailSender } from '../infra/email/index.js';
import type {
  AlertEmailRenderer,
  AlertRecordsRepository,
  AlertRunContext,
  ObligationsRepository,
} from '../modules/deadline-alerts/index.js';
import type { Logger } from 'pino';

export interface AppContextHolder<T> {
  set(context: T): void;
  /** Undefined before `set` and after `clear` */
  get(): T | undefined;
  clear(): void;
}

export const createAppContextHolder = <T>(): AppContextHolder<T> => {
  let current: T | undefined;

  return {
    set(context: T): void {
      current = context;
    },
    get(): T | undefined {
      return current;
    },
    clear(): void {
      current = undefined;
    },
  };
};

export interface AlertRunContextOptions {
  obligationsRepo: ObligationsRepository;
  alertRecordsRepo: AlertRecordsRepository;
  emailSender: EmailSender;
  cacheInvalidator: CacheInvalidator;
  logger: Logger;
  timeZone: string;
  renderer?: AlertEmailRenderer;
  now?: () => Date;
}

export const makeAlertRunContext = (options: AlertRunContextOptions): AlertRunContext => ({
  obligationsRepo: options.obligationsRepo,
  alertRecordsRepo: options.alertRecordsRepo,
  emailSender: options.emailSender,
  cacheInvalidator: options.cacheInvalidator,
  logger: options.logger,
  timeZone: options.timeZone,
  renderer: options.renderer ?? makeDeadlineAlertRenderer({ logger: options.logger }),
  now: options.now ?? (() => new Date()),
});
