import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EmailQuotaNotifier, renderQuotaAlertHtml, renderQuotaAlertText } from '../src/notify/quotaAlert.js';
import type { QuotaAlert } from '../src/notify/quotaAlert.js';

const mailer = vi.hoisted(() => {
  const sendMail = vi.fn(async (_message: Record<string, unknown>) => ({ messageId: 'test-message' }));
  const createTransport = vi.fn((_options: Record<string, unknown>) => ({ sendMail }));
  return { sendMail, createTransport };
});

vi.mock('nodemailer', () => ({
  default: { createTransport: mailer.createTransport },
}));

const ALERT: QuotaAlert = {
  model: 'gpt-test',
  message: 'You exceeded your current quota <billing>',
  url: 'https://careers.example.com/jobs/1?a=1&b=2',
  occurredAt: '2024-05-01T10:00:00.000Z',
};

const SMTP = {
  host: 'smtp.example.com',
  port: '587',
  user: 'alerts',
  pass: 'test-secret',
  from: 'alerts@example.com',
  to: 'ops@example.com',
};

describe('quota alert rendering', () => {
  it('renders a plain-text body', () => {
    expect(renderQuotaAlertText(ALERT)).toBe(
      [
        'Model quota exceeded',
        '',
        'Time: 2024-05-01T10:00:00.000Z',
        'Model: gpt-test',
        'Error: You exceeded your current quota <billing>',
        'Posting URL: https://careers.example.com/jobs/1?a=1&b=2',
        '',
        'Job posting extraction is falling back to static parsing until billing is resolved.',
      ].join('\n'),
    );
  });

  it('escapes values in the HTML body', () => {
    const html = renderQuotaAlertHtml(ALERT);
    expect(html).toContain('<li>Error: You exceeded your current quota &lt;billing&gt;</li>');
    expect(html).toContain('<li>Posting URL: https://careers.example.com/jobs/1?a=1&amp;b=2</li>');
  });
});

describe('EmailQuotaNotifier', () => {
  beforeEach(() => {
    mailer.sendMail.mockClear();
    mailer.createTransport.mockClear();
  });

  it('skips sending when SMTP settings are missing', async () => {
    const notifier = new EmailQuotaNotifier({ ...SMTP, host: undefined });

    await expect(notifier.notifyQuotaExceeded(ALERT)).resolves.toEqual({
      sent: false,
      reason: 'Missing SMTP environment variables.',
    });
    expect(mailer.createTransport).not.toHaveBeenCalled();
  });

  it('rejects a non-numeric port', async () => {
    const notifier = new EmailQuotaNotifier({ ...SMTP, port: 'smtp' });

    await expect(notifier.notifyQuotaExceeded(ALERT)).resolves.toEqual({
      sent: false,
      reason: 'Invalid SMTP port: smtp',
    });
  });

  it('sends one message through the SMTP transport', async () => {
    const notifier = new EmailQuotaNotifier(SMTP);

    await expect(notifier.notifyQuotaExceeded(ALERT)).resolves.toEqual({ sent: true });
    expect(mailer.createTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 587,
      secure: false,
      auth: { user: 'alerts', pass: 'test-secret' },
    });
    expect(mailer.sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: 'alerts@example.com',
        to: 'ops@example.com',
        subject: '[job-extract] Model quota exceeded (gpt-test)',
      }),
    );
  });
});
