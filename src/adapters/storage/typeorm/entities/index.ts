export { ProcessingRecordEntity } from './processing-record.entity';
