import type { EmailSettings } from "../config/types.js";
import type { Notifier, NotifyRequest, NotifyResult } from "./types.js";

export const SENDGRID_SEND_URL = "https://api.sendgrid.com/v3/mail/send";

/** Mail v3 payload: one personalization per recipient, plain-text content. */
export function buildSendGridPayload(
  email: { from: string; fromName: string },
  req: Pick<NotifyRequest, "subject" | "body" | "recipients">
): Record<string, unknown> {
  return {
    personalizations: req.recipients.map((to) => ({ to: [{ email: to }] })),
    from: { email: email.from, name: email.fromName },
    subject: req.subject,
    content: [{ type: "text/plain", value: req.body }],
  };
}

export class SendGridNotifier implements Notifier {
  readonly name = "sendgrid";

  constructor(
    private apiKey: string,
    private email: { from: string; fromName: string },
    private fetchImpl: typeof fetch = fetch
  ) {}

  async send(req: NotifyRequest): Promise<NotifyResult> {
    if (req.recipients.length === 0) {
      return { ok: false, error: "no recipients" };
    }

    const response = await this.fetchImpl(SENDGRID_SEND_URL, {
      method: "POST",
      signal: req.signal,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(buildSendGridPayload(this.email, req)),
    });

    if (response.ok) {
      return { ok: true, status: response.status };
    }

    const detail = await response.text().catch(() => "");
    return {
      ok: false,
      status: response.status,
      error: `HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
    };
  }
}

/** Stands in when email settings are incomplete; every send fails. */
export class UnconfiguredNotifier implements Notifier {
  readonly name = "unconfigured";

  async send(): Promise<NotifyResult> {
    return { ok: false, error: "email delivery is not configured" };
  }
}

export function createNotifier(email: EmailSettings): Notifier {
  if (email.apiKey && email.from && email.to.length > 0) {
    return new SendGridNotifier(email.apiKey, { from: email.from, fromName: email.fromName });
  }
  return new UnconfiguredNotifier();
}
