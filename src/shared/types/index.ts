/**
 * BNPL Credit Protocol - Shared Types Export
 */

export * from './protocol.types';
export * from './event.types';
