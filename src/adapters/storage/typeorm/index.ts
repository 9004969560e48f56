/**
 * TypeORM processing store (PostgreSQL in production)
 */

export { TypeORMProcessingStore } from './typeorm-processing-store.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  PROCESSING_STORE_ENTITIES,
} from './typeorm.config';
export * from './entities';
