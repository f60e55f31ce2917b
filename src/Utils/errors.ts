export type ErrorComponent = 'mqtt' | 'probe' | 'capture' | 'config' | 'monitor';

export class MonitorError extends Error {
  constructor(
    readonly component: ErrorComponent,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connect or publish rejected by the broker or the socket layer. Never fatal. */
export class TransportError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('mqtt', message, options);
  }
}

/** Reading a channel's level failed. The channel counts as inactive for that tick. */
export class CaptureError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('capture', message, options);
  }
}

/** Malformed settings. Only raised at startup, before any loop runs. */
export class ConfigurationError extends MonitorError {
  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super('config', message, options);
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  return String(error);
};
