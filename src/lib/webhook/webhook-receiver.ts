import type { IncomingHttpHeaders } from 'http';
import type { Logger, LoggerService } from '../logger';
import type { PipelineTrigger } from '../pipeline';
import { evaluatePushEvent } from './push-event';
import { SIGNATURE_HEADER, verifySignature } from './signature';

export interface WebhookRequest {
  headers: IncomingHttpHeaders;
  rawBody: Buffer;
}

export interface WebhookResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface WebhookReceiverOptions {
  deployBranch: string;

  /** When set, requests must carry a valid `X-Hub-Signature-256` */
  secret?: string;

  /** Starts a run. Not awaited by `handle`. */
  onTrigger: (trigger: PipelineTrigger) => Promise<unknown>;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Turns push deliveries into pipeline runs, one run at a time. Transport
 * agnostic; `createWebhookApp` mounts it on express.
 */
export class WebhookReceiver {
  private deployBranch: string;
  private secret?: string;
  private onTrigger: WebhookReceiverOptions['onTrigger'];
  private logger: LoggerService;
  private activeRun: Promise<void> | null = null;

  constructor(rootLogger: Logger, options: WebhookReceiverOptions) {
    this.deployBranch = options.deployBranch;
    this.secret = options.secret;
    this.onTrigger = options.onTrigger;
    this.logger = rootLogger.service('webhook');
  }

  public get busy(): boolean {
    return this.activeRun !== null;
  }

  public handle(request: WebhookRequest): WebhookResponse {
    const deliveryID = firstHeader(request.headers['x-github-delivery']);

    if (
      this.secret !== undefined &&
      !verifySignature(
        this.secret,
        request.rawBody,
        firstHeader(request.headers[SIGNATURE_HEADER]),
      )
    ) {
      this.logger.warn('Rejected delivery {{deliveryID}}: bad signature', {
        params: { deliveryID: deliveryID ?? '-' },
      });
      return { status: 401, body: { error: 'invalid signature' } };
    }

    const event = firstHeader(request.headers['x-github-event']);

    if (event !== undefined && event !== 'push') {
      return { status: 200, body: { ignored: `event ${event}` } };
    }

    let payload: unknown;

    try {
      payload = JSON.parse(request.rawBody.toString('utf8'));
    } catch {
      return { status: 400, body: { error: 'malformed JSON' } };
    }

    const decision = evaluatePushEvent(payload, this.deployBranch);

    if (!decision.trigger) {
      if (decision.reason === 'invalid_payload') {
        return { status: 400, body: { error: 'not a push payload' } };
      }

      this.logger.info('Ignored push to {{ref}} ({{reason}})', {
        params: { ref: decision.ref ?? '-', reason: decision.reason },
      });
      return { status: 200, body: { ignored: decision.reason } };
    }

    if (this.activeRun) {
      this.logger.warn('Push to {{ref}} refused: a run is in progress', {
        params: { ref: decision.ref },
      });
      return { status: 409, body: { error: 'a run is already in progress' } };
    }

    const trigger: PipelineTrigger = {
      type: 'webhook',
      ref: decision.ref,
      commit: decision.commit,
      deliveryID,
    };

    this.logger.notice('Push to {{ref}} accepted, starting run', {
      params: { ref: decision.ref },
    });

    this.activeRun = this.onTrigger(trigger)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.errorObject('Triggered run failed unexpectedly', error);
        },
      )
      .finally(() => {
        this.activeRun = null;
      });

    return {
      status: 202,
      body: { accepted: true, ref: decision.ref, commit: decision.commit },
    };
  }

  /**
   * Resolves once no run is active
   */
  public async waitForIdle(): Promise<void> {
    while (this.activeRun) {
      await this.activeRun;
    }
  }
}
