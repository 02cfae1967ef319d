import { Router, Request, Response, NextFunction } from 'express';
import { checkRedisHealth } from '../config/redis';
import { getServices } from '../services/container';

const router = Router();

router.get('/health', async (_req: Request, res: Response) => {
  const redisHealth = await checkRedisHealth();
  const healthy = redisHealth.status !== 'unhealthy';

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    redis: redisHealth,
    timestamp: new Date().toISOString(),
  });
});

router.post('/references/purge', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const report = await getServices().reconciliation.purgeCancelledReferences();
    res.json({ success: true, report });
  } catch (error) {
    next(error);
  }
});

export default router;
