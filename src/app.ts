import express from 'express';
import { createAppointmentRoutes } from './routes/appointments.route.js';
import { createVeterinarianRoutes } from './routes/veterinarians.route.js';
import { IdempotencyService } from './services/idempotency.service.js';
import { SchedulingService } from './services/scheduling.service.js';
import { ApiResponse, ErrorCode } from './types/index.js';

export interface AppDependencies {
  scheduling: SchedulingService;
  idempotency: IdempotencyService;
  /** Per-request access log; on by default. */
  requestLogging?: boolean;
}

export function createApp({ scheduling, idempotency, requestLogging = true }: AppDependencies) {
  const app = express();

  // Middleware
  app.use(express.json());

  // Request logging
  if (requestLogging) {
    app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        console.log(
          `${new Date().toISOString()} | ${req.method} ${req.path} | ${res.statusCode} | ${duration}ms`
        );
      });
      next();
    });
  }

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/veterinarians', createVeterinarianRoutes(scheduling, idempotency));
  app.use('/api/appointments', createAppointmentRoutes(scheduling));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: ErrorCode.NOT_FOUND,
        message: `Endpoint ${req.method} ${req.path} not found`,
      },
    });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof SyntaxError && 'body' in err) {
      const response: ApiResponse = {
        success: false,
        error: { code: ErrorCode.VALIDATION_ERROR, message: 'Request body is not valid JSON' },
      };
      res.status(400).json(response);
      return;
    }

    console.error('Unhandled error:', err);
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An internal server error occurred',
      },
    };
    res.status(500).json(response);
  });

  return app;
}
