import { expect, test } from '@playwright/test';
import type { SendMailOptions } from 'nodemailer';
import type { SmtpConfig } from '../src/config';
import { createSmtpSender, type MailSender, resolveSmtp, sendReportEmail } from '../src/emailer';
import { EmailConfigError } from '../src/errors';

const smtp: SmtpConfig = {
  host: 'smtp.example.com',
  user: 'reports',
  password: 'test-secret',
  from: 'reports@example.com',
  starttls: true,
};

const recordingSender = () => {
  const sent: SendMailOptions[] = [];
  const sender: MailSender = {
    sendMail: async (message) => {
      sent.push(message);
      return { messageId: 'test-message' };
    },
  };
  return { sender, sent };
};

test.describe('Email delivery', () => {
  test('resolveSmtp should default the port to 587', () => {
    expect(resolveSmtp(smtp)).toEqual({
      host: 'smtp.example.com',
      port: 587,
      user: 'reports',
      password: 'test-secret',
      from: 'reports@example.com',
      starttls: true,
    });
    expect(resolveSmtp({ ...smtp, port: 2525 }).port).toBe(2525);
  });

  test('resolveSmtp should name every missing setting', () => {
    expect(() => resolveSmtp({ host: 'smtp.example.com', starttls: true })).toThrow(
      'SMTP config incomplete: missing user, password, from'
    );
    expect(() => resolveSmtp({ starttls: false })).toThrow(EmailConfigError);
  });

  test('sendReportEmail should send one plain-text message to all recipients', async () => {
    const { sender, sent } = recordingSender();

    await sendReportEmail(smtp, ['a@example.com', 'b@example.com'], 'Key Races Weekly Report', 'body text', sender);

    expect(sent).toEqual([
      {
        from: 'reports@example.com',
        to: 'a@example.com, b@example.com',
        subject: 'Key Races Weekly Report',
        text: 'body text',
      },
    ]);
  });

  test('sendReportEmail should not send with incomplete settings', async () => {
    const { sender, sent } = recordingSender();

    await expect(sendReportEmail({ starttls: true }, ['a@example.com'], 'S', 'B', sender)).rejects.toThrow(
      EmailConfigError
    );
    expect(sent).toEqual([]);
  });

  test('createSmtpSender should build a transport without connecting', () => {
    const sender = createSmtpSender(resolveSmtp(smtp));
    expect(typeof sender.sendMail).toBe('function');
  });
});
