/**
 * Webhook delivery
 *
 * POSTs `{ subject, html, alert: false }` to a catch hook (Zapier and the
 * like). When that fails, one short `alert: true` message goes to the same
 * hook so the failure is still noticed. Either way the delivery counts as
 * failed.
 */

import { format } from 'date-fns';
import { esc } from '../render/html-report';
import type { Deliverer, DeliveryResult } from './brevo';

export interface WebhookOptions {
  url: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  alertTimeoutMs?: number;
  now?: () => Date;
}

export interface WebhookPayload {
  subject: string;
  html: string;
  alert: boolean;
}

type PostOutcome = { ok: true; status: number } | { ok: false; reason: string };

export function buildAlertPayload(reason: string, at: Date): WebhookPayload {
  return {
    subject: `ALERT: Fare Watch delivery failed – ${format(at, 'yyyy-MM-dd')}`,
    html: `Primary webhook delivery failed: ${esc(reason)}`,
    alert: true,
  };
}

export class WebhookDeliverer implements Deliverer {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: WebhookOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async deliver(subject: string, html: string): Promise<DeliveryResult> {
    const primary = await this.post({ subject, html, alert: false }, this.options.timeoutMs ?? 15_000);
    if (primary.ok) {
      return { ok: true, message: `Webhook HTTP ${primary.status}` };
    }

    const alert = await this.post(buildAlertPayload(primary.reason, this.now()), this.options.alertTimeoutMs ?? 10_000);
    if (alert.ok) {
      return { ok: false, message: `Webhook delivery failed (${primary.reason}); alert sent` };
    }
    return { ok: false, message: `Webhook delivery failed (${primary.reason}); alert failed (${alert.reason})` };
  }

  private async post(payload: WebhookPayload, timeoutMs: number): Promise<PostOutcome> {
    try {
      const response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
      return response.ok ? { ok: true, status: response.status } : { ok: false, reason: `HTTP ${response.status}` };
    } catch (e) {
      return { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
  }
}
