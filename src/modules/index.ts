/**
 * NestJS integration
 */

export * from './hookwarden';
