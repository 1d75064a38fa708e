import express, { Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from '../config';
import { parseBatchPositionsRequest, parsePositionRequest, parseRouteRequest } from '../services/WaypointParser';
import { PositionSimulator } from '../services/PositionSimulator';
import { RouteAnalyzer, resolveThresholds } from '../services/RouteAnalyzer';
import { RouteEngineError, WaypointParseError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { routeChecksum } from '../utils/waypointUtils';
import { presentPosition, presentReport, presentValidation } from './presenters';

const logger = createLogger({ component: 'Server' });

export function createServer(config: AppConfig) {
  const app = express();
  const analyzer = new RouteAnalyzer();
  const simulator = new PositionSimulator();

  // Middleware
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '5mb' }));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: config.version,
      timestamp: new Date().toISOString(),
    });
  });

  // Full analysis: statistics, segments and anomalies
  app.post('/api/routes/analyze', (req: Request, res: Response) => {
    try {
      const start = Date.now();
      const { route, thresholds } = parseRouteRequest(req.body);
      const report = analyzer.analyze(route, resolveThresholds(thresholds, config.analyzer));

      res.json({
        success: true,
        processingTimeMs: Date.now() - start,
        routeChecksum: routeChecksum(route),
        analysis: presentReport(report),
      });
    } catch (error) {
      sendError(res, error, 'Error analyzing route');
    }
  });

  // Validation: same analysis, framed around the verdict
  app.post('/api/routes/validate', (req: Request, res: Response) => {
    try {
      const { route, thresholds } = parseRouteRequest(req.body);
      const report = analyzer.validate(route, resolveThresholds(thresholds, config.analyzer));

      res.json({
        success: true,
        ...presentValidation(report),
      });
    } catch (error) {
      sendError(res, error, 'Error validating route');
    }
  });

  // Position at a single instant
  app.post('/api/simulation/position', (req: Request, res: Response) => {
    try {
      const { route, timestamp } = parsePositionRequest(req.body);
      const position = simulator.simulateOne(route, timestamp);

      res.json({
        success: true,
        position: presentPosition(position),
      });
    } catch (error) {
      sendError(res, error, 'Error simulating position');
    }
  });

  // Positions for many instants, in request order
  app.post('/api/simulation/positions-batch', (req: Request, res: Response) => {
    try {
      const { route, timestamps } = parseBatchPositionsRequest(req.body);
      const positions = simulator.simulateBatch(route, timestamps);

      res.json({
        success: true,
        count: positions.length,
        positions: positions.map(presentPosition),
      });
    } catch (error) {
      sendError(res, error, 'Error simulating positions');
    }
  });

  return app;
}

/**
 * Map known engine errors to their status; anything else is a 500
 */
function sendError(res: Response, error: unknown, message: string): void {
  if (error instanceof WaypointParseError) {
    res.status(error.status).json({
      success: false,
      error: error.message,
      details: error.issues,
    });
    return;
  }

  if (error instanceof RouteEngineError) {
    res.status(error.status).json({
      success: false,
      error: error.message,
    });
    return;
  }

  logger.error({ error }, message);
  res.status(500).json({
    success: false,
    error: message,
  });
}
