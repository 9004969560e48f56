export * from './signature-header';
export * from './signature-verifier';
