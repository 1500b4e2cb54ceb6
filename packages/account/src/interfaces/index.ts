export * from './types';
export * from './mailbox-protocol';
