export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export type ConnectionEvent =
  | { type: 'connectRequested' }
  | { type: 'connackReceived' }
  | { type: 'transportClosed'; reason: string }
  | { type: 'probeConfirmed' }
  | { type: 'teardown' };

/**
 * A close before the first CONNACK is a failed connect and lands in `disconnected`
 * (recovery is left to the status probe). A close after it means the transport is
 * retrying on its own, so the session stays `reconnecting` until the next CONNACK.
 */
const stateAfterClose = (state: ConnectionState): ConnectionState =>
  state === 'connected' || state === 'reconnecting' ? 'reconnecting' : 'disconnected';

export const nextState = (state: ConnectionState, event: ConnectionEvent): ConnectionState => {
  switch (event.type) {
    case 'connectRequested':
      return state === 'disconnected' ? 'connecting' : state;
    case 'connackReceived':
    case 'probeConfirmed':
      return 'connected';
    case 'transportClosed':
      return stateAfterClose(state);
    case 'teardown':
      return 'disconnected';
  }
};
