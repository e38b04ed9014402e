import request from 'supertest';
import app from '@/app';
import { userProgram } from '@/config/dependencies';
import { resetMetrics } from '@/api/middlewares/metricsMiddleware';

jest.mock('@/config/dependencies', () => ({
  userProgram: {
    insertUser: jest.fn(),
    getAllUsers: jest.fn(),
    deleteUserByUsername: jest.fn(),
  },
}));

const mockUserProgram = jest.mocked(userProgram);

describe('Application routes', () => {
  beforeEach(() => {
    resetMetrics();
  });

  describe('GET /health', () => {
    it('should report the service as up', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toMatchObject({ status: 'ok', service: 'user-registry-api' });
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  describe('GET /', () => {
    it('should describe the service endpoints', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.body.name).toBe('User Registry API');
      expect(response.body.endpoints).toEqual({
        health: '/health',
        metrics: '/metrics',
        createUser: 'POST /user',
        listUsers: 'GET /users',
        deleteUser: 'DELETE /user/:username',
      });
    });
  });

  describe('unknown routes', () => {
    it('should return 404 with the method and path', async () => {
      const response = await request(app).get('/nope').expect(404);

      expect(response.body).toEqual({ message: 'Route GET /nope not found' });
    });

    it('should not expose a PUT on users', async () => {
      const response = await request(app).put('/user/jdoe').send({}).expect(404);

      expect(response.body).toEqual({ message: 'Route PUT /user/jdoe not found' });
    });
  });

  describe('GET /metrics', () => {
    it('should serve Prometheus text', async () => {
      const response = await request(app).get('/metrics').expect(200);

      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
      expect(response.text).toContain('# TYPE http_requests_total counter');
      expect(response.text).toContain('# TYPE process_uptime_seconds gauge');
      expect(response.text).toMatch(/^app_info\{version="1\.0\.0",node_version="v[^"]+",env="test"\} 1$/m);
    });

    it('should count user requests under their route patterns', async () => {
      mockUserProgram.getAllUsers.mockResolvedValue([]);
      mockUserProgram.deleteUserByUsername.mockResolvedValue(undefined);

      await request(app).get('/users').expect(200);
      await request(app).delete('/user/jdoe').expect(204);
      await request(app).delete('/user/rroe').expect(204);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).toContain('http_requests_total{method="GET",path="/users",status="200"} 1');
      expect(response.text).toContain('http_requests_total{method="DELETE",path="/user/:username",status="204"} 2');
      expect(response.text).toContain('http_request_duration_seconds_count{method="DELETE",path="/user/:username"} 2');
    });

    it('should count unknown routes under one series', async () => {
      await request(app).get('/random-1').expect(404);
      await request(app).get('/random-2').expect(404);
      await request(app).delete('/user/jdoe/extra').expect(404);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).toContain('http_requests_total{method="GET",path="unmatched",status="404"} 2');
      expect(response.text).toContain('http_requests_total{method="DELETE",path="unmatched",status="404"} 1');
      expect(response.text).not.toContain('random-');
    });

    it('should not count health checks', async () => {
      await request(app).get('/health').expect(200);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).not.toContain('path="/health"');
    });
  });
});
