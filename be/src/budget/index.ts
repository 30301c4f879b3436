import budgetRouter from './routes/budgetRoutes.js';

export { budgetRouter };
