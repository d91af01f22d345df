/**
 * Injection tokens for the inbox module
 */

export const INBOX_CONFIG = Symbol('INBOX_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
export const MESSAGE_SERVICE = Symbol('MESSAGE_SERVICE');
