/**
 * Alert delivery.
 *
 * SmtpNotifier sends through the SMTP relay named in email_settings;
 * DryRunNotifier (--no-emails) logs the full message instead. Both throw on
 * failure -- the run loop decides what a failed send means.
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import { createLogger } from '../logger.js';
import type { AlertMessage } from './reporter.js';

const log = createLogger('Notifier');

export interface Notifier {
  readonly name: string;
  send(message: AlertMessage): Promise<void>;
}

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface SmtpNotifierOptions {
  host: string;
  port: number;
  secure: boolean;
  sender: string;
  user?: string;
  pass?: string;
  /** Injected transport (tests); built from the options otherwise */
  transport?: MailTransport;
}

export class SmtpNotifier implements Notifier {
  readonly name = 'smtp';
  private readonly sender: string;
  private readonly transport: MailTransport;

  constructor(opts: SmtpNotifierOptions) {
    this.sender = opts.sender;
    this.transport =
      opts.transport ??
      nodemailer.createTransport({
        host: opts.host,
        port: opts.port,
        secure: opts.secure,
        auth: opts.user ? { user: opts.user, pass: opts.pass } : undefined,
      });
  }

  async send(message: AlertMessage): Promise<void> {
    await this.transport.sendMail({
      from: this.sender,
      to: message.recipients.join(', '),
      subject: message.subject,
      html: message.html,
    });
    log.info(`Sent "${message.subject}" to ${message.recipients.join(', ')}`);
  }
}

export class DryRunNotifier implements Notifier {
  readonly name = 'dry-run';

  constructor(private readonly sender: string) {}

  async send(message: AlertMessage): Promise<void> {
    log.info(
      'Skipping sending this email:\n\n' +
        `From: ${this.sender}\n` +
        `To: ${message.recipients.join(', ')}\n` +
        `Subject: ${message.subject}\n\n` +
        `${message.html}\n`,
    );
  }
}
