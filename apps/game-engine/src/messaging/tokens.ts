export const NATS_CONNECTION = 'NATS_CONNECTION';
export const EVENT_PUBLISHER = 'EVENT_PUBLISHER';
export const COMMAND_HANDLER = 'COMMAND_HANDLER';
