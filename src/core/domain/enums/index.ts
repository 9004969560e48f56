export * from './processing-status.enum';
export * from './verification-failure.enum';
export * from './receipt-decision.enum';
