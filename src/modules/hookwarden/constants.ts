/**
 * Injection tokens for the Hookwarden module
 */

export const PROCESSING_STORE = Symbol('PROCESSING_STORE');
export const EVENT_ROUTER = Symbol('EVENT_ROUTER');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
export const HOOKWARDEN_CONFIG = Symbol('HOOKWARDEN_CONFIG');
export const CLOCK = Symbol('CLOCK');
