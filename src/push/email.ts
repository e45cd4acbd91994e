/**
 * Email notifier — one SMTP session per notification via nodemailer:
 * connect, authenticate, send a single plain-text message, close.
 */

import nodemailer from 'nodemailer';
import type { LatestItem, NotificationEvent, Notifier } from '../source/adapter.js';
import type { Config } from '../shared/config.js';
import { SendError, type SendErrorKind, errorMessage } from '../shared/errors.js';
import { fail, ok, type Result } from '../shared/result.js';
import { logger } from '../shared/logger.js';

export type EmailConfig = Config['email'];

const AUTH_RESPONSE_CODES = new Set([530, 534, 535]);

export function renderNotificationText(item: LatestItem): string {
  return `A new video has been uploaded.\nTitle: ${item.title}\nLink: ${item.url}`;
}

/**
 * nodemailer reports bad credentials as code EAUTH; some servers only give
 * the SMTP reply code.
 */
export function classifySendError(err: unknown): SendErrorKind {
  if (err !== null && typeof err === 'object') {
    if ('code' in err && err.code === 'EAUTH') return 'AuthFailed';
    if ('responseCode' in err && typeof err.responseCode === 'number' && AUTH_RESPONSE_CODES.has(err.responseCode)) {
      return 'AuthFailed';
    }
  }
  return 'TransportFailed';
}

export class EmailNotifier implements Notifier {
  constructor(private readonly config: EmailConfig) {}

  async send(event: NotificationEvent): Promise<Result<void, SendError>> {
    const transporter = this.createTransport();
    try {
      await transporter.sendMail({
        from: this.config.from || this.config.smtp_user,
        to: this.config.to,
        subject: this.config.subject,
        text: renderNotificationText(event.item),
      });
      logger.info({ sourceId: event.sourceId, itemId: event.item.itemId, to: this.config.to }, 'Notification email sent');
      return ok(undefined);
    } catch (err) {
      const kind = classifySendError(err);
      return fail(
        new SendError(kind, `Email send failed: ${errorMessage(err)}`, {
          sourceId: event.sourceId,
          host: this.config.smtp_host,
        }),
      );
    } finally {
      transporter.close();
    }
  }

  /**
   * Verify SMTP connection and credentials without sending.
   */
  async verify(): Promise<Result<void, SendError>> {
    const transporter = this.createTransport();
    try {
      await transporter.verify();
      return ok(undefined);
    } catch (err) {
      return fail(new SendError(classifySendError(err), `SMTP verify failed: ${errorMessage(err)}`));
    } finally {
      transporter.close();
    }
  }

  private createTransport() {
    return nodemailer.createTransport({
      host: this.config.smtp_host,
      port: this.config.smtp_port,
      secure: this.config.smtp_port === 465,
      auth: {
        user: this.config.smtp_user,
        pass: this.config.smtp_pass,
      },
      connectionTimeout: this.config.timeout_ms,
      greetingTimeout: this.config.timeout_ms,
      socketTimeout: this.config.timeout_ms,
    });
  }
}
