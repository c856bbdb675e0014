import express from 'express';
import cors from 'cors';
import { logger } from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';

// Import routes
import conversionRoutes from './routes/conversionRoutes';

const app = express();

// Middleware
app.use(cors({ exposedHeaders: ['X-Request-ID', 'X-Conversion-Report', 'Content-Disposition'] }));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Request ID middleware - must be before request logging
app.use(requestIdMiddleware);

// Request logging with request ID and response timing
app.use((req, res, next) => {
  const start = Date.now();
  logger.info(`${req.method} ${req.path} started`);

  // Log response when finished
  res.on('finish', () => {
    const duration = Date.now() - start;
    logger.info(`${req.method} ${req.path} completed`, {
      statusCode: res.statusCode,
      duration: `${duration}ms`,
    });
  });

  next();
});

// Health check
app.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// API Routes
app.use('/api/conversions', conversionRoutes);

// 404 handler
app.use(notFoundHandler);

// Error handler
app.use(errorHandler);

export default app;
