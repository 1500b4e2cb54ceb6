/**
 * Tests for pull subscriptions
 */

import { createLogger } from '@mailroot/logger';

import { Account } from './account';
import { Subscription } from './subscription';
import { ALL_EVENT_TYPES } from './interfaces/types';

import type { MailboxProtocol } from './interfaces/mailbox-protocol';
import type { FolderNode, MailboxEvent, MailboxEventType } from './interfaces/types';

const createProtocol = (): jest.Mocked<MailboxProtocol> => ({
  version: 'Exchange2016',
  getFolderByDistinguishedId: jest.fn(),
  listChildFolders: jest.fn(),
  probeQuery: jest.fn(),
  updateItems: jest.fn(),
  deleteItems: jest.fn(),
  exportItems: jest.fn(),
  uploadItems: jest.fn(),
  subscribe: jest.fn().mockResolvedValue({ subscriptionId: 'sub-1', watermark: 'w0' }),
  getEvents: jest.fn(),
  unsubscribe: jest.fn().mockResolvedValue(undefined),
});

const inbox: FolderNode = { id: 'in', name: 'Inbox', isDistinguished: true, folderType: 'Inbox' };

const newMail: MailboxEvent = {
  type: 'NewMailEvent',
  timestamp: '2026-01-05T09:30:00Z',
  itemId: { id: 'm1', changeKey: 'ck-m1' },
  folderId: 'in',
};

describe('Subscription', () => {
  let protocol: jest.Mocked<MailboxProtocol>;
  let account: Account;

  beforeEach(async () => {
    protocol = createProtocol();
    account = await Account.create({
      primarySmtpAddress: 'anna@example.com',
      config: { protocol },
      settings: { locale: 'da_DK', verifySsl: true, logLevel: 'error' },
      logger: createLogger({ minLevel: 'fatal' }),
    });
  });

  it('should subscribe to all events with the default timeout', async () => {
    const subscription = await Subscription.create(account, inbox);

    expect(protocol.subscribe).toHaveBeenCalledWith(
      account.getContext(),
      inbox,
      [...ALL_EVENT_TYPES],
      20
    );
    expect(subscription.isActive).toBe(true);
    expect(subscription.folder).toBe(inbox);
  });

  it('should subscribe to selected events', async () => {
    await Subscription.create(account, inbox, ['NewMailEvent', 'DeletedEvent'], 5);

    expect(protocol.subscribe).toHaveBeenCalledWith(
      expect.anything(),
      inbox,
      ['NewMailEvent', 'DeletedEvent'],
      5
    );
  });

  it('should reject unknown events', async () => {
    await expect(
      Subscription.create(account, inbox, ['SneezeEvent' as unknown as MailboxEventType])
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    expect(protocol.subscribe).not.toHaveBeenCalled();
  });

  it('should reject an empty event list', async () => {
    await expect(Subscription.create(account, inbox, [])).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
  });

  it('should reject a non-positive timeout', async () => {
    await expect(Subscription.create(account, inbox, ALL_EVENT_TYPES, 0)).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
  });

  it('should advance the watermark between polls', async () => {
    protocol.getEvents
      .mockResolvedValueOnce({ events: [newMail], state: { subscriptionId: 'sub-1', watermark: 'w1' } })
      .mockResolvedValueOnce({ events: [], state: { subscriptionId: 'sub-1', watermark: 'w2' } });
    const subscription = await Subscription.create(account, inbox);

    await expect(subscription.getEvents()).resolves.toEqual([newMail]);
    await expect(subscription.getEvents()).resolves.toEqual([]);

    expect(protocol.getEvents).toHaveBeenNthCalledWith(1, expect.anything(), {
      subscriptionId: 'sub-1',
      watermark: 'w0',
    });
    expect(protocol.getEvents).toHaveBeenNthCalledWith(2, expect.anything(), {
      subscriptionId: 'sub-1',
      watermark: 'w1',
    });
  });

  it('should refuse calls after unsubscribe', async () => {
    const subscription = await Subscription.create(account, inbox);

    await subscription.unsubscribe();

    expect(protocol.unsubscribe).toHaveBeenCalledWith(account.getContext(), {
      subscriptionId: 'sub-1',
      watermark: 'w0',
    });
    expect(subscription.isActive).toBe(false);
    await expect(subscription.getEvents()).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    await expect(subscription.unsubscribe()).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('should stay active when unsubscribe fails', async () => {
    const error = new Error('server busy');
    protocol.unsubscribe.mockRejectedValueOnce(error);
    const subscription = await Subscription.create(account, inbox);

    await expect(subscription.unsubscribe()).rejects.toBe(error);
    expect(subscription.isActive).toBe(true);
  });
});
