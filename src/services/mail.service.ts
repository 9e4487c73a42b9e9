import nodemailer, { Transporter } from 'nodemailer';
import { logger } from '../utils/logger';
import { MailConfig } from '../config/types';
import { ConfigurationError, toError } from './base/errors';
import { ReportMailer, ReportMessage } from './base/types';

export function createSmtpTransport(config: MailConfig): Transporter {
  if (!config.host) {
    throw new ConfigurationError('SMTP_HOST is not configured', 'SMTP_HOST');
  }

  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.username && config.password ? { user: config.username, pass: config.password } : undefined,
    connectionTimeout: 30000,
    greetingTimeout: 30000
  });
}

export class MailService implements ReportMailer {
  private logger = logger.child({ service: 'MailService' });

  constructor(private config: MailConfig, private transporter: Transporter = createSmtpTransport(config)) {}

  async sendReport(message: ReportMessage): Promise<void> {
    const { sender, recipients } = this.config;
    if (!sender || recipients.length === 0) {
      throw new ConfigurationError('REPORT_SENDER and REPORT_RECIPIENTS are required to send reports', 'REPORT_RECIPIENTS');
    }

    try {
      const info = await this.transporter.sendMail({
        from: sender,
        to: recipients.join(', '),
        subject: message.subject,
        html: message.html
      });
      this.logger.info('Report sent', { subject: message.subject, recipients: recipients.length, messageId: info.messageId });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Failed to send report '${message.subject}': ${cause.message}`);
      throw cause;
    }
  }
}
