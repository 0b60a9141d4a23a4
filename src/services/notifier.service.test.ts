import { describe, it, expect, vi } from 'vitest';
import { createNotifier, splitAddress, type MailTransport } from './notifier.service.js';
import type { MailConfig } from '../config.js';
import { NotifyError } from '../errors.js';

const mailConfig = (from: string): MailConfig => ({
  from,
  to: ['ops@example.com'],
  smtp: { host: 'localhost', port: 25, secure: false },
});

describe('splitAddress', () => {
  it.each([
    { input: 'a@b.com', address: 'a@b.com', name: '' },
    { input: '<a@b.com>', address: 'a@b.com', name: '' },
    { input: 'Name <a@b.com>', address: 'a@b.com', name: 'Name' },
    { input: 'Name<a@b.com>', address: 'a@b.com', name: 'Name' },
  ])('$input', ({ input, address, name }) => {
    expect(splitAddress(input)).toEqual([address, name]);
  });

  it('keeps multi-word display names', () => {
    expect(splitAddress('Inventory Bot  <bot@example.com>')).toEqual(['bot@example.com', 'Inventory Bot']);
  });
});

describe('createNotifier', () => {
  it('sends the HTML body with a named sender', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: 'm1' });
    const notifier = createNotifier(
      mailConfig('Inventory Bot <bot@example.com>'),
      { sendMail } as unknown as MailTransport
    );

    await expect(notifier.send('Stock report', '<p>hi</p>')).resolves.toEqual({ ok: true });
    expect(sendMail).toHaveBeenCalledWith({
      from: { name: 'Inventory Bot', address: 'bot@example.com' },
      to: ['ops@example.com'],
      subject: 'Stock report',
      html: '<p>hi</p>',
    });
  });

  it('uses the bare address when there is no display name', async () => {
    const sendMail = vi.fn().mockResolvedValue({});
    const notifier = createNotifier(mailConfig('<bot@example.com>'), { sendMail } as unknown as MailTransport);

    await notifier.send('s', 'b');
    expect(sendMail.mock.calls[0][0]).toMatchObject({ from: 'bot@example.com' });
  });

  it('returns a NotifyError instead of throwing', async () => {
    const sendMail = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:25'));
    const notifier = createNotifier(mailConfig('bot@example.com'), { sendMail } as unknown as MailTransport);

    const result = await notifier.send('Stock report', '<p>hi</p>');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotifyError);
      expect(result.error.stage).toBe('notify');
      expect(result.error.message).toBe('Email "Stock report" not sent: connect ECONNREFUSED 127.0.0.1:25');
    }
  });
});
