import nodemailer from "nodemailer";
import Mail from "nodemailer/lib/mailer";
import { HarvestEnv, NotificationConfig } from "../config/harvestConfig";
import { ConfigError, errorMessage } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { NotificationChannel, NotificationMessage, SendResult } from "./notificationChannel";

export interface Envelope {
  from: string;
  to: string[];
}

/** The part of a nodemailer transporter the channel uses. */
export interface MailSender {
  sendMail(options: Mail.Options): Promise<{ messageId: string }>;
}

export class SmtpChannel implements NotificationChannel {
  private readonly log: Logger;

  constructor(
    private readonly transporter: MailSender,
    private readonly envelope: Envelope,
    logger?: Logger
  ) {
    this.log = logger ?? componentLogger("smtp");
  }

  async send(message: NotificationMessage): Promise<SendResult> {
    try {
      const info = await this.transporter.sendMail({
        from: this.envelope.from,
        to: this.envelope.to.join(", "),
        subject: message.subject,
        text: message.text,
        attachments: message.attachments.map((attachment) => ({
          filename: attachment.filename,
          content: attachment.content,
          contentType: attachment.contentType
        }))
      });
      this.log.info({ messageId: info.messageId, to: this.envelope.to }, "report sent");
      return { ok: true, messageId: info.messageId };
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ err: message }, "report email failed");
      return { ok: false, error: message };
    }
  }
}

export function createSmtpChannel(env: HarvestEnv, notification: NotificationConfig, logger?: Logger): SmtpChannel {
  if (!env.SMTP_HOST) {
    throw new ConfigError("SMTP_HOST is required to send reports");
  }
  const transporter = nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    auth: env.SMTP_USER ? { user: env.SMTP_USER, pass: env.SMTP_PASS } : undefined,
    connectionTimeout: 10000,
    socketTimeout: 30000
  });
  return new SmtpChannel(transporter, { from: notification.from, to: notification.to }, logger);
}
