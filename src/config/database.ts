import { Sequelize } from 'sequelize-typescript';
import { cacheModels } from '../models/index.js';
import logger from '../utils/logger.js';

/**
 * Opens the local cache database and creates any missing tables. Pass
 * `':memory:'` for a throwaway cache.
 */
export const createCacheDatabase = async (storage: string): Promise<Sequelize> => {
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: false,
    models: cacheModels,
    pool: { max: 1, min: 0 },
  });

  await sequelize.authenticate();
  await sequelize.sync();
  logger.info(`Cache database ready at ${storage}`);
  return sequelize;
};
