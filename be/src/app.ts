import express, { Request, Response } from 'express';
import helmet from 'helmet';
import { budgetRouter } from './budget/index.js';
import errorMiddleware from './middleware/errorMiddleware.js';
import instrumentMiddleware from './middleware/instrumentMiddleware.js';

const app = express();

app.use(express.json());
app.use(helmet());
app.use(instrumentMiddleware);

app.get('/', (req: Request, res: Response) => {
  res.send('Budget API');
});

app.use('/api/budget', budgetRouter);

app.use(errorMiddleware);

export default app;
