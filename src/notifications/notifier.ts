/**
 * Notification collaborators.
 *
 * A Notifier delivers one message per call and throws on failure; retries
 * and circuit breaking belong to the dispatcher. Throw FatalOperationError
 * for failures that will never succeed (bad URL, 4xx).
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { FatalOperationError } from '../engine/retry-executor';
import { Logger, logger as rootLogger } from '../logger';

export interface NotificationMessage {
  /** User id, or `role:<role>` for everyone holding a role. */
  recipientId: string;
  templateKey: string;
  parameters: Record<string, unknown>;
}

export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

/** Body POSTed to the webhook endpoint. */
export interface WebhookPayload extends NotificationMessage {
  id: string;
  timestamp: string;
}

/** Transport used by WebhookNotifier (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  body: string,
  headers: Record<string, string>,
) => Promise<{ statusCode: number }>;

/**
 * Validate that a webhook URL is safe to send requests to. Returns an error
 * message for unsafe URLs, null otherwise.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();
  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }
  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    if (a === 10) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 172 && b >= 16 && b <= 31) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 192 && b === 168) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

const WEBHOOK_TIMEOUT_MS = 10_000;

const httpDelivery: WebhookDeliveryFn = async (url, body, headers) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), WEBHOOK_TIMEOUT_MS);
  try {
    const response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
    return { statusCode: response.status };
  } finally {
    clearTimeout(timeout);
  }
};

export interface WebhookNotifierOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
  clock?: () => number;
}

/** Delivers notifications to one HTTP endpoint, HMAC-signed when a secret is set. */
export class WebhookNotifier implements Notifier {
  private readonly deliveryFn: WebhookDeliveryFn;
  private readonly clock: () => number;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
    this.clock = options.clock ?? Date.now;
  }

  async send(message: NotificationMessage): Promise<void> {
    const urlError = validateWebhookUrl(this.options.url);
    if (urlError) {
      throw new FatalOperationError(urlError);
    }

    const payload: WebhookPayload = {
      id: `ntf_${uuid()}`,
      timestamp: new Date(this.clock()).toISOString(),
      ...message,
    };
    const body = JSON.stringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'request-orchestrator-webhook/0.1.0',
      'X-Notification-Id': payload.id,
      'X-Notification-Template': message.templateKey,
    };
    if (this.options.signingSecret) {
      const signature = createHmac('sha256', this.options.signingSecret).update(body).digest('hex');
      headers['X-Notification-Signature'] = `sha256=${signature}`;
    }

    const { statusCode } = await this.deliveryFn(this.options.url, body, headers);
    if (statusCode >= 400 && statusCode < 500) {
      throw new FatalOperationError(`Webhook rejected notification with HTTP ${statusCode}`);
    }
    if (statusCode >= 500) {
      throw new Error(`Webhook returned HTTP ${statusCode}`);
    }
  }
}

/** Writes notifications to the log. Used when no webhook is configured. */
export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ module: 'notifier' });
  }

  async send(message: NotificationMessage): Promise<void> {
    this.log.info('Notification', {
      recipientId: message.recipientId,
      templateKey: message.templateKey,
      parameters: message.parameters,
    });
  }
}
