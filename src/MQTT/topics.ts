export const STATUS_TOPIC = 'microphones/status';
export const PING_TOPIC = 'microphones/ping';
export const PING_PAYLOAD = 'ping';

export type Availability = 'online' | 'offline';

export const availabilityPayload = (status: Availability) => JSON.stringify({ status });
