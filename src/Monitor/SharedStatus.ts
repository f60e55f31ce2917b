import { type PerChannel, perChannel } from '../Common/channels';
import type { ErrorComponent } from '@utils/errors';

export type ChannelView = Readonly<{ level: number; active: boolean }>;

export type ErrorView = Readonly<{ component: ErrorComponent; message: string; at: number }>;

export type StatusSnapshot = Readonly<{
  connected: boolean;
  reconnecting: boolean;
  reconnectAttempts: number;
  messagesSent: number;
  /** `"<topic>: <payload>"` of the last channel message handed to the broker. */
  lastMessage: string | null;
  /** Epoch seconds. */
  lastMessageTimestamp: number | null;
  lastError: ErrorView | null;
  channels: Readonly<PerChannel<ChannelView>>;
}>;

/**
 * The connection fields SharedStatus mirrors. `ConnectionManager.snapshot()` fits.
 */
export type ConnectionFields = Readonly<{
  connected: boolean;
  reconnecting: boolean;
  reconnectAttempts: number;
  messagesSent: number;
  lastMessage: Readonly<{ topic: string; payload: string; timestamp: number }> | null;
  lastError: Readonly<{ component: ErrorComponent; message: string }> | null;
}>;

const INITIAL_SNAPSHOT: StatusSnapshot = Object.freeze({
  connected: false,
  reconnecting: false,
  reconnectAttempts: 0,
  messagesSent: 0,
  lastMessage: null,
  lastMessageTimestamp: null,
  lastError: null,
  channels: Object.freeze(perChannel(() => Object.freeze({ level: 0, active: false }))),
});

/**
 * Read-only view for the dashboard.
 *
 * Every update builds a new frozen snapshot and swaps it in whole, so a reader holding
 * a snapshot never sees half of an update.
 */
export class SharedStatus {
  private current: StatusSnapshot = INITIAL_SNAPSHOT;
  private connectionError: ConnectionFields['lastError'] = null;

  constructor(private readonly now: () => number = Date.now) {}

  snapshot(): StatusSnapshot {
    return this.current;
  }

  updateChannels(views: PerChannel<ChannelView>) {
    this.replace({
      channels: Object.freeze(perChannel((channel) => Object.freeze({ ...views[channel] }))),
    });
  }

  /**
   * Mirror the connection counters. A new connection error replaces `lastError`; when
   * the connection clears its error, a connection-originated `lastError` is cleared too.
   */
  updateConnection(connection: ConnectionFields) {
    let lastError = this.current.lastError;
    if (connection.lastError !== this.connectionError) {
      this.connectionError = connection.lastError;
      if (connection.lastError) {
        lastError = Object.freeze({ ...connection.lastError, at: this.now() });
      } else if (lastError && (lastError.component === 'mqtt' || lastError.component === 'probe')) {
        lastError = null;
      }
    }

    this.replace({
      connected: connection.connected,
      reconnecting: connection.reconnecting,
      reconnectAttempts: connection.reconnectAttempts,
      messagesSent: connection.messagesSent,
      lastMessage: connection.lastMessage ? `${connection.lastMessage.topic}: ${connection.lastMessage.payload}` : null,
      lastMessageTimestamp: connection.lastMessage?.timestamp ?? null,
      lastError,
    });
  }

  reportError(component: ErrorComponent, message: string) {
    this.replace({ lastError: Object.freeze({ component, message, at: this.now() }) });
  }

  private replace(patch: Partial<StatusSnapshot>) {
    this.current = Object.freeze({ ...this.current, ...patch });
  }
}
