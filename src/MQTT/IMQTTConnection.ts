export type QoS = 0 | 1 | 2;

export type PublishOptions = { qos?: QoS; retain?: boolean };

/** Called once the message left the client, or with the reason it could not. */
export type PublishCallback = (error?: Error) => void;

export type WillMessage = {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
};

export type ReconnectWindow = {
  minDelayMs: number;
  maxDelayMs: number;
};

export interface MQTTConnectionOptions {
  host: string;
  port: number;
  clientId: string;
  username?: string;
  password?: string;
  keepaliveSec: number;
  connectTimeoutMs: number;
  will: WillMessage;
  /**
   * Delay bounds for the transport's own reconnect after an established session drops.
   * A transport that never reached CONNACK does not retry by itself.
   */
  reconnect: ReconnectWindow;
}

export type MQTTConnectionFactory = (options: MQTTConnectionOptions) => IMQTTConnection;

/**
 * A single broker session. Owned by `ConnectionManager`; nothing else holds one.
 *
 * Events:
 * - `connect`: CONNACK received (initial connect or transport-level reconnect)
 * - `close`: the socket closed without `end()`/`disconnect()` being called
 * - `error`: socket or protocol error; usually followed by `close`
 * - `reconnect`: the transport scheduled its next automatic reconnect
 */
export interface IMQTTConnection {
  readonly clientId: string;
  /** The transport's own view of the session. Can lag behind a half-open socket. */
  isConnected(): boolean;
  /**
   * Hand a message to the network loop without waiting for the broker.
   * Returns false when the message was rejected up front (not connected, closing).
   */
  publish(topic: string, message: string | object, options?: PublishOptions, callback?: PublishCallback): boolean;
  /**
   * Graceful close: flush what is in flight, send DISCONNECT, then release the client.
   * Falls back to `disconnect()` once `timeoutMs` elapses.
   */
  end(timeoutMs: number): Promise<void>;
  /**
   * Hard-stop the client (no DISCONNECT packet, the broker will fire the last will) and
   * drop every listener so a replaced session can never emit into its successor.
   */
  disconnect(): void;
  on(event: 'connect', listener: () => void): this;
  on(event: 'close', listener: (reason: string) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'reconnect', listener: (attempt: number, delayMs: number) => void): this;
}
