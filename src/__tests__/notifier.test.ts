import { describe, it, expect, vi } from 'vitest';
import { DryRunNotifier, SmtpNotifier, type MailTransport } from '../monitor/notifier.js';
import type { AlertMessage } from '../monitor/reporter.js';

const message: AlertMessage = {
  recipients: ['ops@example.test', 'storage@example.test'],
  subject: 'prod: Soft quota alert on path /eng/',
  html: 'The quota on directory path "/eng/" has exceeded the usage threshold of 95%.',
};

describe('SmtpNotifier', () => {
  it('sends one mail to every recipient from the configured sender', async () => {
    const transport: MailTransport = { sendMail: vi.fn(async () => ({ messageId: 'test' })) };
    const notifier = new SmtpNotifier({
      host: 'smtp.example.test',
      port: 25,
      secure: false,
      sender: 'alerts@example.test',
      transport,
    });

    await notifier.send(message);

    expect(transport.sendMail).toHaveBeenCalledTimes(1);
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'ops@example.test, storage@example.test',
      subject: 'prod: Soft quota alert on path /eng/',
      html: 'The quota on directory path "/eng/" has exceeded the usage threshold of 95%.',
    });
  });

  it('propagates transport failures', async () => {
    const transport: MailTransport = {
      sendMail: vi.fn(async () => {
        throw new Error('connection refused');
      }),
    };
    const notifier = new SmtpNotifier({
      host: 'smtp.example.test',
      port: 25,
      secure: false,
      sender: 'alerts@example.test',
      transport,
    });

    await expect(notifier.send(message)).rejects.toThrow('connection refused');
  });
});

describe('DryRunNotifier', () => {
  it('logs the message instead of sending it', async () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    await new DryRunNotifier('alerts@example.test').send(message);

    expect(consoleLog).toHaveBeenCalledTimes(1);
    expect(String(consoleLog.mock.calls[0]?.[0])).toContain('Subject: prod: Soft quota alert on path /eng/');
  });
});
