import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { createServer } from '../server';
import { loadConfig } from '../../config';
import { RouteAnalyzer } from '../../services/RouteAnalyzer';

// Two points in Islamabad, ten minutes apart
const ISLAMABAD = [
  { id: 'start', latitude: 33.6844, longitude: 73.0479, timestamp: 0 },
  { id: 'end', latitude: 33.6938, longitude: 73.0651, timestamp: 600_000 },
];

describe('API Server', () => {
  let app: ReturnType<typeof createServer>;

  beforeEach(() => {
    app = createServer(loadConfig({ API_VERSION: '2.1.0' }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.version).toBe('2.1.0');
      expect(response.body.timestamp).toBeDefined();
    });
  });

  describe('POST /api/routes/analyze', () => {
    it('should return rounded statistics', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({ waypoints: ISLAMABAD });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.routeChecksum).toMatch(/^[0-9a-f]{64}$/);

      const { analysis } = response.body;
      expect(analysis.totalDistanceMeters).toBe(1904);
      expect(analysis.durationSeconds).toBe(600);
      expect(analysis.averageSpeedMps).toBe(3.17);
      expect(analysis.maxSpeedMps).toBe(3.17);
      expect(analysis.startTime).toBe('1970-01-01T00:00:00.000Z');
      expect(analysis.segments[0].bearing).toBe(56.7);
      expect(analysis.valid).toBe(true);
      expect(analysis.anomalies).toEqual([]);
    });

    it('should report a zero-duration jump as TELEPORT', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({
          waypoints: [
            { id: 'p', latitude: 0, longitude: 0, timestamp: 0 },
            { id: 'q', latitude: 0.0044966, longitude: 0, timestamp: 0 },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body.analysis.valid).toBe(false);
      expect(response.body.analysis.anomalies).toHaveLength(1);
      expect(response.body.analysis.anomalies[0].kind).toBe('TELEPORT');
    });

    it('should report out-of-range coordinates as anomalies', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({
          waypoints: [
            { id: 'p', latitude: 0, longitude: 0, timestamp: 0 },
            { id: 'q', latitude: 95, longitude: 0, timestamp: 1000 },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body.analysis.anomalies[0].kind).toBe('OUT_OF_BOUNDS');
    });

    it('should summarize parking stops', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({
          waypoints: [
            { ...ISLAMABAD[0], isParking: true, parkingDurationMinutes: 12.5 },
            { ...ISLAMABAD[1], isParking: true },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body.analysis.parking).toEqual({
        totalStops: 2,
        totalParkingMinutes: 12.5,
        averageParkingMinutes: 12.5,
        longestParkingMinutes: 12.5,
        locations: [
          {
            waypointIndex: 0,
            id: 'start',
            coordinate: { latitude: 33.6844, longitude: 73.0479 },
            durationMinutes: 12.5,
          },
          {
            waypointIndex: 1,
            id: 'end',
            coordinate: { latitude: 33.6938, longitude: 73.0651 },
            durationMinutes: null,
          },
        ],
      });
    });

    it('should apply threshold overrides from the request', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({ waypoints: ISLAMABAD, thresholds: { maxPlausibleSpeedMps: 2 } });

      expect(response.status).toBe(200);
      expect(response.body.analysis.valid).toBe(false);
      expect(response.body.analysis.anomalies[0].kind).toBe('TELEPORT');
    });

    it('should reject an empty route', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({ waypoints: [] });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        success: false,
        error: 'Route must contain at least one waypoint',
      });
    });

    it('should reject a malformed payload', async () => {
      const response = await request(app)
        .post('/api/routes/analyze')
        .send({ waypoints: [{ id: 'p', latitude: 'north', longitude: 0, timestamp: 0 }] });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.details[0].path).toBe('waypoints.0.latitude');
    });

    it('should answer 500 on unexpected failures', async () => {
      vi.spyOn(RouteAnalyzer.prototype, 'analyze').mockImplementation(() => {
        throw new Error('boom');
      });

      const response = await request(app)
        .post('/api/routes/analyze')
        .send({ waypoints: ISLAMABAD });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ success: false, error: 'Error analyzing route' });
    });
  });

  describe('POST /api/routes/validate', () => {
    it('should split errors from warnings', async () => {
      const response = await request(app)
        .post('/api/routes/validate')
        .send({
          waypoints: [
            { id: 'a', latitude: 0, longitude: 0, timestamp: 0 },
            { id: 'a2', latitude: 0, longitude: 0, timestamp: 0 },
            { id: 'b', latitude: 0, longitude: 0.01, timestamp: 100_000 },
            { id: 'c', latitude: 0.01, longitude: 0.01, timestamp: 50_000 },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body.valid).toBe(false);
      expect(response.body.canProceed).toBe(false);
      expect(response.body.errors.map((e: { kind: string }) => e.kind)).toEqual(['NON_MONOTONIC_TIME']);
      expect(response.body.warnings.map((w: { kind: string }) => w.kind)).toEqual(['DUPLICATE_POINT']);
      expect(response.body.statistics).toEqual({
        totalWaypoints: 4,
        flaggedWaypoints: 2,
        errorsCount: 1,
        warningsCount: 1,
      });
    });

    it('should pass a clean route', async () => {
      const response = await request(app)
        .post('/api/routes/validate')
        .send({ waypoints: ISLAMABAD });

      expect(response.body.valid).toBe(true);
      expect(response.body.errors).toEqual([]);
    });
  });

  describe('POST /api/simulation/position', () => {
    it('should interpolate midway along the route', async () => {
      const response = await request(app)
        .post('/api/simulation/position')
        .send({ waypoints: ISLAMABAD, timestamp: '1970-01-01T00:05:00Z' });

      expect(response.status).toBe(200);
      expect(response.body.position).toEqual({
        coordinate: { latitude: 33.6891, longitude: 73.0565 },
        timestamp: '1970-01-01T00:05:00.000Z',
        interpolated: true,
        bearing: 56.7,
        heading: 'NE',
        speed: 3.17,
        speedKmh: 11.42,
        source: 'INTERPOLATED',
        status: 'moving',
        segment: { fromIndex: 0, toIndex: 1, fraction: 0.5 },
        degenerate: false,
        progress: { overallPercent: 50, completedWaypoints: 1, remainingWaypoints: 1, totalWaypoints: 2 },
        eta: {
          nextWaypoint: '1970-01-01T00:10:00.000Z',
          finalDestination: '1970-01-01T00:10:00.000Z',
          minutesToNextWaypoint: 5,
          minutesToDestination: 5,
        },
        distanceToNextWaypointMeters: 952,
      });
    });

    it('should read a timestamp without zone as UTC', async () => {
      const response = await request(app)
        .post('/api/simulation/position')
        .send({ waypoints: ISLAMABAD, timestamp: '1970-01-01T00:05:00' });

      expect(response.status).toBe(200);
      expect(response.body.position.timestamp).toBe('1970-01-01T00:05:00.000Z');
      expect(response.body.position.source).toBe('INTERPOLATED');
    });

    it('should reject out-of-range coordinates', async () => {
      const response = await request(app)
        .post('/api/simulation/position')
        .send({
          waypoints: [{ id: 'p', latitude: 95, longitude: 0, timestamp: 0 }],
          timestamp: 0,
        });

      expect(response.status).toBe(422);
      expect(response.body.error).toBe('Invalid coordinate (95, 0)');
    });

    it('should require a timestamp', async () => {
      const response = await request(app)
        .post('/api/simulation/position')
        .send({ waypoints: ISLAMABAD });

      expect(response.status).toBe(400);
      expect(response.body.details.map((d: { path: string }) => d.path)).toEqual(['timestamp']);
    });
  });

  describe('POST /api/simulation/positions-batch', () => {
    it('should return one position per timestamp in request order', async () => {
      const response = await request(app)
        .post('/api/simulation/positions-batch')
        .send({ waypoints: ISLAMABAD, timestamps: [900_000, -100_000, 300_000] });

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(3);
      expect(response.body.positions.map((p: { source: string }) => p.source)).toEqual([
        'EXTRAPOLATED_AFTER',
        'EXTRAPOLATED_BEFORE',
        'INTERPOLATED',
      ]);
      expect(response.body.positions[1].coordinate).toEqual({ latitude: 33.6844, longitude: 73.0479 });
    });
  });
});
