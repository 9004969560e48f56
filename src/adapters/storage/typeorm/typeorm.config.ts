import { DataSource, DataSourceOptions } from 'typeorm';
import { ProcessingRecordEntity } from './entities';

/**
 * Entities the processing store needs registered on its DataSource
 */
export const PROCESSING_STORE_ENTITIES = [ProcessingRecordEntity];

/**
 * TypeORM configuration for the processing store (PostgreSQL by default)
 */
export const createTypeORMConfig = (
  options?: Partial<DataSourceOptions>,
): DataSourceOptions => {
  const defaultConfig: DataSourceOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'hookwarden',
    password: process.env.DB_PASSWORD || 'hookwarden',
    database: process.env.DB_NAME || 'hookwarden',
    entities: PROCESSING_STORE_ENTITIES,
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    subscribers: [],
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  if (!options) {
    return defaultConfig;
  }

  return Object.assign({}, defaultConfig, options);
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<DataSourceOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
