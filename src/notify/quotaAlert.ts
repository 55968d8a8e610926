import nodemailer from 'nodemailer';
import type { SmtpSettings } from '../config.js';

export interface QuotaAlert {
  model: string;
  message: string;
  url?: string;
  occurredAt: string;
}

export interface NotifyResult {
  sent: boolean;
  reason?: string;
}

export interface QuotaNotifier {
  notifyQuotaExceeded(alert: QuotaAlert): Promise<NotifyResult>;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderQuotaAlertText(alert: QuotaAlert): string {
  const lines = [
    'Model quota exceeded',
    '',
    `Time: ${alert.occurredAt}`,
    `Model: ${alert.model}`,
    `Error: ${alert.message}`,
  ];
  if (alert.url) {
    lines.push(`Posting URL: ${alert.url}`);
  }
  lines.push('', 'Job posting extraction is falling back to static parsing until billing is resolved.');
  return lines.join('\n');
}

export function renderQuotaAlertHtml(alert: QuotaAlert): string {
  const urlItem = alert.url ? `\n      <li>Posting URL: ${escapeHtml(alert.url)}</li>` : '';
  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>Model quota exceeded</title>
  </head>
  <body>
    <h1>Model quota exceeded</h1>
    <ul>
      <li>Time: ${escapeHtml(alert.occurredAt)}</li>
      <li>Model: ${escapeHtml(alert.model)}</li>
      <li>Error: ${escapeHtml(alert.message)}</li>${urlItem}
    </ul>
    <p>Job posting extraction is falling back to static parsing until billing is resolved.</p>
  </body>
</html>`;
}

export class EmailQuotaNotifier implements QuotaNotifier {
  constructor(private readonly smtp: SmtpSettings) {}

  async notifyQuotaExceeded(alert: QuotaAlert): Promise<NotifyResult> {
    const { host, port, user, pass, from, to } = this.smtp;
    if (!host || !port || !user || !pass || !from || !to) {
      return { sent: false, reason: 'Missing SMTP environment variables.' };
    }

    const parsedPort = Number(port);
    if (!Number.isFinite(parsedPort)) {
      return { sent: false, reason: `Invalid SMTP port: ${port}` };
    }

    const transporter = nodemailer.createTransport({
      host,
      port: parsedPort,
      secure: parsedPort === 465,
      auth: {
        user,
        pass,
      },
    });

    await transporter.sendMail({
      from,
      to,
      subject: `[job-extract] Model quota exceeded (${alert.model})`,
      html: renderQuotaAlertHtml(alert),
      text: renderQuotaAlertText(alert),
    });

    return { sent: true };
  }
}
