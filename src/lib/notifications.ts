import nodemailer from 'nodemailer';
import type { Config } from '../config';
import { logger } from '../logger';
import type { Bank } from '../types';

export const LINK_EMAIL_SUBJECT = 'Open Banking Connection Activation';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export function renderLinkEmail(bank: Pick<Bank, 'name'>, link: string): string {
  return [
    'Hello,',
    '',
    `The connection to ${bank.name} needs to be activated before its transactions can be archived again.`,
    '',
    `Open the following link to authorise access: ${link}`,
    '',
    'No further reminders will be sent until the connection is active.',
  ].join('\n');
}

export class LinkNotifier {
  constructor(
    private readonly transport: MailTransport,
    private readonly fromEmail: string
  ) {}

  static fromConfig(smtp: Config['smtp']): LinkNotifier {
    const transport = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.port === 465,
      auth: {
        user: smtp.username,
        pass: smtp.password,
      },
      connectionTimeout: 10000,
    });
    return new LinkNotifier(transport, smtp.fromEmail);
  }

  /**
   * Email the activation link for a bank. Resolves to false when the message
   * could not be handed to the SMTP server.
   */
  async sendLink(toEmail: string, bank: Bank, link: string): Promise<boolean> {
    const message: MailMessage = {
      from: this.fromEmail,
      to: toEmail,
      subject: LINK_EMAIL_SUBJECT,
      text: renderLinkEmail(bank, link),
    };

    try {
      logger.debug({ bankId: bank.id, to: toEmail }, 'Sending link email');
      await this.transport.sendMail(message);
      logger.info({ bankId: bank.id, bank: bank.name }, 'Link email sent');
      return true;
    } catch (err) {
      logger.error({ err, bankId: bank.id, bank: bank.name }, 'Failed to send link email');
      return false;
    }
  }
}
