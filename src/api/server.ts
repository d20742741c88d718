import express, { Express } from 'express';
import { Server } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from '../models/config';
import { OrchestratorDeps } from '../pipeline/generation-orchestrator';
import { createHealthRoute } from './routes/health';
import { createGenerateRoute } from './routes/generate';
import { createJobsRoute } from './routes/jobs';
import { createParseRoute } from './routes/parse';
import { createShareRoute } from './routes/share';
import { createResultsRoute } from './routes/results';
import { createUpdateStatusRoute } from './routes/update-status';
import { createExportRoute } from './routes/export';
import { createTestCasesRoute } from './routes/test-cases';
import { ConnectionDeps, createConnectionsRoute } from './routes/connections';
import { createGenerateRateLimiter } from './middleware/rate-limiter';
import { errorHandler } from './middleware/error-handler';
import logger from '../utils/logger';

export function createExpressApp(
  config: AppConfig,
  deps: OrchestratorDeps,
  connectionDeps: ConnectionDeps = {}
): Express {
  const app = express();

  app.use(helmet());

  if (config.server.cors?.enabled) {
    app.use(
      cors({
        origin: config.server.cors.origins,
        credentials: true,
      })
    );
  }

  app.use(express.json({ limit: '5mb' }));

  app.use((req, _res, next) => {
    logger.info('API request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.use('/api/health', createHealthRoute(config.testTypes));
  app.use('/api/generate', createGenerateRateLimiter(config.server.rate_limit), createGenerateRoute(deps));
  app.use('/api/jobs', createJobsRoute());
  app.use('/api/parse', createParseRoute());
  app.use('/api/share', createShareRoute());
  app.use('/api/results', createResultsRoute());
  app.use('/api/update-status', createUpdateStatusRoute());
  app.use('/api/export', createExportRoute());
  app.use('/api/test-cases', createTestCasesRoute());
  app.use('/api', createConnectionsRoute(connectionDeps));

  app.use(errorHandler);

  logger.info('Express app initialized', {
    cors_enabled: config.server.cors?.enabled ?? false,
    primary_provider: deps.primary.name,
    fallback_provider: deps.fallback?.name,
  });

  return app;
}

export function startExpressServer(app: Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once('listening', () => {
      logger.info(`Express server started on port ${port}`);
      resolve(server);
    });

    server.on('error', (error: Error) => {
      logger.error('Express server error', { error: error.message, port });
      reject(error);
    });
  });
}
