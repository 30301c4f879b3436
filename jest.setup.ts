import 'reflect-metadata';

process.env.BUDGET_DB = ':memory:';
