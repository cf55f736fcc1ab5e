export { evaluatePushEvent } from './push-event';
export type { PushEventDecision } from './push-event';
export {
  computeSignature,
  verifySignature,
  SIGNATURE_HEADER,
} from './signature';
export { WebhookReceiver } from './webhook-receiver';
export type {
  WebhookRequest,
  WebhookResponse,
  WebhookReceiverOptions,
} from './webhook-receiver';
export { createWebhookApp } from './webhook-app';
export type { WebhookAppOptions } from './webhook-app';
