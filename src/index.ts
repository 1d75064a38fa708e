import dotenv from 'dotenv';
import { createServer } from './api/server';
import { loadConfig } from './config';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

const config = loadConfig();

logger.info('🚀 Starting route simulation service...');
logger.info({ thresholds: config.analyzer }, '📏 Default analyzer thresholds');

const app = createServer(config);

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `✅ Server running on http://localhost:${config.port}`);
  logger.info('📊 API endpoints:');
  logger.info('   GET  /health                          - Health check');
  logger.info('   POST /api/routes/analyze              - Route statistics and anomalies');
  logger.info('   POST /api/routes/validate             - Route plausibility verdict');
  logger.info('   POST /api/simulation/position         - Position at one instant');
  logger.info('   POST /api/simulation/positions-batch  - Positions at many instants');
});

// Graceful shutdown
const shutdown = () => {
  logger.info('🛑 Shutting down gracefully...');
  server.close(() => {
    logger.info('✅ Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
