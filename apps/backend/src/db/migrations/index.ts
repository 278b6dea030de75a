import fs from 'fs';
import path from 'path';
import { withTransaction } from '../index';
import logger from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export const SCHEMA_PATH = path.resolve(__dirname, '..', 'schema.sql');

export const runMigrations = async (): Promise<boolean> => {
  try {
    logger.info('Running database migrations...');

    const schemaContent = fs.readFileSync(SCHEMA_PATH, 'utf8');

    await withTransaction(async (client) => {
      await client.query(schemaContent);
    });

    logger.info('Database migrations completed successfully');
    return true;
  } catch (error) {
    logger.error(`Error running migrations: ${errorMessage(error)}`);
    return false;
  }
};
