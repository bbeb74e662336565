import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config/index.js';
import { createStatusRoutes } from './routes/status.routes.js';
import { createAuthRoutes } from './routes/auth.routes.js';
import { createChallengesRoutes } from './routes/challenges.routes.js';
import { createSolvesRoutes } from './routes/solves.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { loggingMiddleware } from './middleware/logging.middleware.js';
import { contextMiddleware } from './middleware/context.middleware.js';
import { StatusHandler } from '../handlers/status.handler.js';
import { AuthHandler } from '../handlers/auth.handler.js';
import { ChallengesHandler } from '../handlers/challenges.handler.js';
import { SolvesHandler } from '../handlers/solves.handler.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface ServerDependencies {
  statusHandler: StatusHandler;
  authHandler: AuthHandler;
  challengesHandler: ChallengesHandler;
  solvesHandler: SolvesHandler;
}

export function createServer(dependencies: ServerDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS: every origin is reflected and credentials are allowed.
  // This is a deliberately open posture; narrow `origin` before a public deployment.
  app.use(
    cors({
      origin: true,
      methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
      credentials: true,
    })
  );

  // Compression middleware
  app.use(compression());

  // Body parsing middleware
  app.use(express.json({ limit: config.jsonBodyLimit }));

  // Context middleware (must be before logging)
  app.use(contextMiddleware);

  // Logging middleware
  app.use(loggingMiddleware);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  const swaggerDocument = YAML.load(path.join(__dirname, '../../swagger/swagger.yaml'));
  swaggerDocument.servers = [
    {
      url: `http://localhost:${config.port}`,
      description: `${config.nodeEnv} server`,
    },
  ];

  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));

  // Root and diagnostic endpoints
  app.use('/', createStatusRoutes(dependencies.statusHandler));

  // Mount API routes
  app.use('/api', createAuthRoutes(dependencies.authHandler));
  app.use('/api', createSolvesRoutes(dependencies.solvesHandler));
  app.use('/api/challenges', createChallengesRoutes(dependencies.challengesHandler));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        message: `Cannot ${req.method} ${req.path}`,
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorMiddleware);

  return app;
}
