/**
 * @mailroot/account - Pull Subscription
 *
 * Thin wrapper around the protocol's pull subscription calls. Each
 * `getEvents()` advances the stored watermark.
 */

import { AccountError } from './interfaces/mailbox-protocol';
import { ALL_EVENT_TYPES } from './interfaces/types';

import type { Account } from './account';
import type {
  FolderNode,
  MailboxEvent,
  MailboxEventType,
  SubscriptionState,
} from './interfaces/types';

export const DEFAULT_SUBSCRIPTION_TIMEOUT_MINUTES = 20;

export class Subscription {
  private state: SubscriptionState | null;

  private constructor(
    private readonly account: Account,
    readonly folder: FolderNode,
    readonly events: readonly MailboxEventType[],
    state: SubscriptionState
  ) {
    this.state = state;
  }

  /**
   * Subscribe to events on a folder
   */
  static async create(
    account: Account,
    folder: FolderNode,
    events: readonly MailboxEventType[] = ALL_EVENT_TYPES,
    timeoutMinutes: number = DEFAULT_SUBSCRIPTION_TIMEOUT_MINUTES
  ): Promise<Subscription> {
    const unknown = events.filter((event) => !ALL_EVENT_TYPES.includes(event));
    if (unknown.length > 0 || events.length === 0) {
      throw new AccountError(
        `Invalid subscription events: ${unknown.join(', ') || '(none)'}`,
        'INVALID_ARGUMENT'
      );
    }
    if (!Number.isInteger(timeoutMinutes) || timeoutMinutes <= 0) {
      throw new AccountError(`Invalid subscription timeout ${timeoutMinutes}`, 'INVALID_ARGUMENT');
    }

    const state = await account.protocol.subscribe(
      account.getContext(),
      folder,
      [...events],
      timeoutMinutes
    );
    return new Subscription(account, folder, events, state);
  }

  get isActive(): boolean {
    return this.state !== null;
  }

  /**
   * Events since the previous call
   */
  async getEvents(): Promise<MailboxEvent[]> {
    const state = this.requireState();
    const result = await this.account.protocol.getEvents(this.account.getContext(), state);
    this.state = result.state;
    return result.events;
  }

  async unsubscribe(): Promise<void> {
    const state = this.requireState();
    await this.account.protocol.unsubscribe(this.account.getContext(), state);
    this.state = null;
  }

  private requireState(): SubscriptionState {
    if (!this.state) {
      throw new AccountError('Subscription has been cancelled', 'INVALID_ARGUMENT');
    }
    return this.state;
  }
}
