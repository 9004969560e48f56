/**
 * What the sender is told about a delivery
 */
export enum ReceiptKind {
  ACCEPT = 'accept',
  REJECT = 'reject',
  RETRY = 'retry',
}
