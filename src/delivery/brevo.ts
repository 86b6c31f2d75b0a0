/**
 * Report Delivery
 *
 * BrevoDeliverer sends the report through Brevo's transactional email API.
 * FileDeliverer is the dry-run path and only writes the HTML to disk.
 * Neither retries: a failed delivery is reported and the run exits non-zero.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PROVIDER_URLS } from '../config/constants';

export interface DeliveryResult {
  ok: boolean;
  message: string;
}

export interface Deliverer {
  deliver(subject: string, html: string): Promise<DeliveryResult>;
}

export interface BrevoOptions {
  apiKey: string;
  fromEmail: string;
  fromName: string;
  toEmail: string;
  endpoint?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

export interface BrevoPayload {
  sender: { email: string; name: string };
  to: Array<{ email: string }>;
  subject: string;
  htmlContent: string;
}

export function buildBrevoPayload(options: BrevoOptions, subject: string, html: string): BrevoPayload {
  return {
    sender: { email: options.fromEmail, name: options.fromName },
    to: [{ email: options.toEmail }],
    subject,
    htmlContent: html,
  };
}

export class BrevoDeliverer implements Deliverer {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: BrevoOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(subject: string, html: string): Promise<DeliveryResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.endpoint ?? PROVIDER_URLS.brevo, {
        method: 'POST',
        headers: {
          accept: 'application/json',
          'content-type': 'application/json',
          'api-key': this.options.apiKey,
        },
        body: JSON.stringify(buildBrevoPayload(this.options, subject, html)),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
      });
    } catch (e) {
      return { ok: false, message: `Brevo request failed: ${e instanceof Error ? e.message : String(e)}` };
    }

    const body = await response.text().catch(() => '');
    if (!response.ok) {
      return { ok: false, message: `Brevo HTTP ${response.status}: ${body.slice(0, 300)}` };
    }
    return { ok: true, message: `Sent to ${this.options.toEmail}` };
  }
}

export class FileDeliverer implements Deliverer {
  constructor(private readonly outFile: string) {}

  async deliver(_subject: string, html: string): Promise<DeliveryResult> {
    const target = path.resolve(this.outFile);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, html, 'utf-8');
    } catch (e) {
      return { ok: false, message: `Could not write ${target}: ${e instanceof Error ? e.message : String(e)}` };
    }
    return { ok: true, message: `Wrote ${target}` };
  }
}
