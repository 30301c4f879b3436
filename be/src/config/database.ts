import 'reflect-metadata';
import { Sequelize } from 'sequelize-typescript';
import config from './environment.js';
import logger from '../utils/logger.js';
import { budgetModels } from '../budget/models/index.js';

const sequelize = new Sequelize({
  dialect: 'sqlite',
  storage: config.databaseStorage,
  logging: false,
  models: budgetModels,
});

export async function connectDatabase(): Promise<void> {
  await sequelize.authenticate();
  logger.info(`Database connection successful (storage=${config.databaseStorage})`);
}

export default sequelize;
