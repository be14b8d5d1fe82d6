import { describe, expect, it } from 'vitest';
import type { Bank } from '../types';
import { LINK_EMAIL_SUBJECT, LinkNotifier, type MailMessage, renderLinkEmail } from './notifications';

const bank: Bank = {
  id: 3,
  name: 'Alpha Bank',
  externalId: 'INST_A',
  providerType: 'open_banking',
  activeRequisitionId: 'req-1',
  activationEmailSent: false,
};

describe('LinkNotifier', () => {
  it('sends the activation link as plain text', async () => {
    const sent: MailMessage[] = [];
    const notifier = new LinkNotifier(
      {
        sendMail: async (message) => {
          sent.push(message);
          return { messageId: 'm-1' };
        },
      },
      'archiver@example.com'
    );

    await expect(
      notifier.sendLink('user@example.com', bank, 'https://provider.test/link/req-1')
    ).resolves.toBe(true);

    expect(sent).toEqual([
      {
        from: 'archiver@example.com',
        to: 'user@example.com',
        subject: LINK_EMAIL_SUBJECT,
        text: renderLinkEmail(bank, 'https://provider.test/link/req-1'),
      },
    ]);
    expect(sent[0].subject).toBe('Open Banking Connection Activation');
  });

  it('resolves to false when the server rejects the message', async () => {
    const notifier = new LinkNotifier(
      {
        sendMail: async () => {
          throw new Error('535 authentication failed');
        },
      },
      'archiver@example.com'
    );

    await expect(notifier.sendLink('user@example.com', bank, 'https://x.test')).resolves.toBe(false);
  });
});

describe('renderLinkEmail', () => {
  it('names the bank and includes the link', () => {
    const body = renderLinkEmail(bank, 'https://provider.test/link/req-1');

    expect(body.split('\n')).toEqual([
      'Hello,',
      '',
      'The connection to Alpha Bank needs to be activated before its transactions can be archived again.',
      '',
      'Open the following link to authorise access: https://provider.test/link/req-1',
      '',
      'No further reminders will be sent until the connection is active.',
    ]);
  });
});
