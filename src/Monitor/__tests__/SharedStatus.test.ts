import { describe, expect, it } from 'vitest';
import { type ConnectionFields, SharedStatus } from '../SharedStatus';

const connection = (patch: Partial<ConnectionFields> = {}): ConnectionFields => ({
  connected: true,
  reconnecting: false,
  reconnectAttempts: 0,
  messagesSent: 0,
  lastMessage: null,
  lastError: null,
  ...patch,
});

describe('SharedStatus', () => {
  it('starts disconnected with silent channels', () => {
    expect(new SharedStatus().snapshot()).toEqual({
      connected: false,
      reconnecting: false,
      reconnectAttempts: 0,
      messagesSent: 0,
      lastMessage: null,
      lastMessageTimestamp: null,
      lastError: null,
      channels: { left: { level: 0, active: false }, right: { level: 0, active: false } },
    });
  });

  it('swaps in a new frozen snapshot on every update', () => {
    const status = new SharedStatus();
    const before = status.snapshot();
    status.updateChannels({ left: { level: 700, active: true }, right: { level: 20, active: false } });
    const after = status.snapshot();

    expect(after).not.toBe(before);
    expect(before.channels.left).toEqual({ level: 0, active: false });
    expect(after.channels.left).toEqual({ level: 700, active: true });
    expect(Object.isFrozen(after)).toBe(true);
    expect(Object.isFrozen(after.channels)).toBe(true);
    expect(Object.isFrozen(after.channels.left)).toBe(true);
  });

  it('mirrors the connection counters and formats the last message', () => {
    const status = new SharedStatus();
    status.updateConnection(
      connection({
        messagesSent: 4,
        lastMessage: { topic: 'microphones/left', payload: '{"state":1}', timestamp: 12.5 },
      })
    );

    expect(status.snapshot()).toMatchObject({
      connected: true,
      messagesSent: 4,
      lastMessage: 'microphones/left: {"state":1}',
      lastMessageTimestamp: 12.5,
    });
  });

  it('tracks connection errors and clears them when the connection recovers', () => {
    const status = new SharedStatus(() => 1_000);
    status.updateConnection(connection({ connected: false, lastError: { component: 'mqtt', message: 'refused' } }));
    expect(status.snapshot().lastError).toEqual({ component: 'mqtt', message: 'refused', at: 1_000 });

    status.updateConnection(connection());
    expect(status.snapshot().lastError).toBeNull();
  });

  it('keeps a capture error when the connection error clears', () => {
    const status = new SharedStatus(() => 5);
    status.updateConnection(connection({ lastError: { component: 'probe', message: 'Disconnected from MQTT broker' } }));
    status.reportError('capture', 'Error reading left microphone: gone');
    status.updateConnection(connection());

    expect(status.snapshot().lastError).toEqual({
      component: 'capture',
      message: 'Error reading left microphone: gone',
      at: 5,
    });
  });

  it('does not re-stamp an unchanged connection error', () => {
    let now = 1;
    const status = new SharedStatus(() => now);
    const lastError = { component: 'mqtt' as const, message: 'refused' };
    status.updateConnection(connection({ lastError }));
    now = 2;
    status.updateConnection(connection({ lastError, messagesSent: 1 }));

    expect(status.snapshot().lastError?.at).toBe(1);
  });
});
