import type { LoggerService } from '../logger';
import { NotificationFailedError } from './errors';
import type { Notifier, RunNotification } from './types';

/**
 * Reports the outcome through the logger
 */
export class LoggerNotifier implements Notifier {
  public readonly name = 'logger';
  private logger: LoggerService;

  constructor(logger: LoggerService) {
    this.logger = logger;
  }

  public notify(notification: RunNotification): Promise<void> {
    if (notification.status === 'success') {
      this.logger.success(
        'Run {{runID}} deployed build {{buildID}}; service at {{endpoint}}',
        { params: { ...notification } },
      );
    } else {
      this.logger.error(
        'Run {{runID}} failed at {{failedStage}}: {{reason}}',
        { params: { ...notification } },
      );
    }

    return Promise.resolve();
  }
}

export type NotifyFetchFunction = (
  url: string,
  init: {
    method: 'POST';
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
  },
) => Promise<{ ok: boolean; status: number }>;

export interface WebhookNotifierOptions {
  url: string;
  timeoutMS?: number;
  fetch?: NotifyFetchFunction;
}

/**
 * POSTs the notification as JSON. Any non-2xx answer is a failure.
 */
export class WebhookNotifier implements Notifier {
  public readonly name = 'webhook';
  private url: string;
  private timeoutMS: number;
  private fetchFn: NotifyFetchFunction;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.timeoutMS = options.timeoutMS ?? 10_000;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  public async notify(notification: RunNotification): Promise<void> {
    let response: { ok: boolean; status: number };

    try {
      response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(notification),
        signal: AbortSignal.timeout(this.timeoutMS),
      });
    } catch (error) {
      throw new NotificationFailedError(
        `Could not reach ${this.url}`,
        { notifier: this.name },
        error,
      );
    }

    if (!response.ok) {
      throw new NotificationFailedError(
        `${this.url} answered ${response.status}`,
        { notifier: this.name, statusCode: response.status },
      );
    }
  }
}

/**
 * Delivers to every notifier; each failure is logged and the rest still run
 */
export class FanOutNotifier implements Notifier {
  public readonly name = 'fan-out';
  private notifiers: Notifier[];
  private logger: LoggerService;

  constructor(notifiers: Notifier[], logger: LoggerService) {
    this.notifiers = notifiers;
    this.logger = logger;
  }

  public async notify(notification: RunNotification): Promise<void> {
    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(notification);
      } catch (error) {
        this.logger.errorObject(`Notifier ${notifier.name} failed`, error);
      }
    }
  }
}
