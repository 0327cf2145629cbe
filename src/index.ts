import 'dotenv/config';
import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { handle } from './api/errors';
import { issueToken, validateToken, verifyAuthorization } from './api/auth/auth';
import { getSettings } from './api/settings/settings';
import { endFormSession, getFormSession, startSession, updateFormSession } from './api/session/session';
import { addExpense, getRecentExpenses } from './api/expenses/expenses';
import { addIncome } from './api/income/income';
import { getDashboard } from './api/dashboard/dashboard';
import { getConfig } from './utils/config/config';
import { loadSettings } from './utils/io/settings';
import { log } from './utils/log';

declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}

// Fail at startup on a bad environment or settings file
const config = getConfig();
loadSettings();

const app: Express = express();

// Middleware
app.use(express.json());
app.use(bodyParser.urlencoded({ extended: true }));

const verifyToken = (req: Request, res: Response, next: NextFunction) => {
  const userId = verifyAuthorization(req.headers.authorization);
  if (userId === null) {
    res.status(401).json({ message: 'Invalid token' });
    return;
  }
  req.userId = userId;
  next();
};

// Auth routes
app.post('/api/auth/token', handle(issueToken));
app.get('/api/auth/validate', handle(validateToken));

app.get('/api/settings', verifyToken, handle(getSettings));

// Session routes
app.post('/api/session', verifyToken, handle(startSession));
app
  .route('/api/session/:id')
  .get(verifyToken, handle(getFormSession))
  .put(verifyToken, handle(updateFormSession))
  .delete(verifyToken, handle(endFormSession));

// Transaction routes
app.post('/api/expenses', verifyToken, handle(addExpense));
app.get('/api/expenses/recent', verifyToken, handle(getRecentExpenses));
app.post('/api/income', verifyToken, handle(addIncome));

app.get('/api/dashboard', verifyToken, handle(getDashboard));

// Start server
app.listen(config.port, () => {
  log('Server is running', { port: config.port, store: config.store.kind });
});
