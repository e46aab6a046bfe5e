import { Hono } from 'hono';
import { logger as httpLogger } from 'hono/logger';
import { logger } from './logger';
import { createStakingRoutes } from './routes/staking';
import type { StakingTokens } from './routes/staking';
import type { StakingEngine } from './staking';

export function createApp(engine: StakingEngine, tokens: StakingTokens): Hono {
  const app = new Hono();

  app.use('*', httpLogger((message, ...rest) => logger.info([message, ...rest].join(' '))));

  app.get('/health', (c) => c.json({ success: true, status: 'ok' }));
  app.route('/staking', createStakingRoutes(engine, tokens));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));
  app.onError((err, c) => {
    logger.error(`${c.req.method} ${c.req.path} failed: ${err.stack ?? err.message}`);
    return c.json({ success: false, error: 'Internal server error' }, 500);
  });

  return app;
}
