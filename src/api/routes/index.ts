import { Router } from 'express';
import usersRoutes from './users.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';

const router = Router();

/**
 * Routes
 * Base path: /
 */

// Health check endpoint (infrastructure, not rate limited)
router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'user-registry-api',
  });
});

// Prometheus-format metrics for monitoring tools
router.get('/metrics', getMetrics);

router.use(usersRoutes);

export default router;
