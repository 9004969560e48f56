export * from './processing-record.model';
export * from './verified-event.model';
