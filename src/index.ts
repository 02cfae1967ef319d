import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis, redis } from './config/redis';
import { scheduleReferencePurge } from './config/queue';
import { getServices } from './services/container';
import { startReferencePurgeWorker } from './workers/reconcile.worker';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { errorHandler } from './middleware/errorHandler';
import adminRoutes from './routes/admin.routes';
import chatRoutes from './routes/chat.routes';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const app = express();

// Middleware
app.use(helmet());
app.use(cors());
app.use(express.json());

// Rate limiting
const limiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
});
app.use('/api', limiter);

// Routes
app.use('/api/chat', chatRoutes);
app.use('/api/admin', adminRoutes);

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Error handler
if (env.SENTRY_DSN) {
  Sentry.setupExpressErrorHandler(app);
}
app.use(errorHandler);

// Start
async function start() {
  try {
    const services = getServices();

    if (redis) {
      await connectRedis();
      startReferencePurgeWorker(services.reconciliation);
      await scheduleReferencePurge();
    }

    app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();

export default app;
