import { INestApplication } from '@nestjs/common';
import { rmSync } from 'fs';
import request from 'supertest';
import { createTestApp } from '../utils/test-helpers';

describe('Home Endpoints (E2E)', () => {
  let app: INestApplication;
  let outputDir: string;

  beforeAll(async () => {
    ({ app, outputDir } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('GET / should return app info outside the API prefix', async () => {
    const response = await request(app.getHttpServer()).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      name: 'Clinical Summary API',
      version: '1.0.0',
      description:
        'Structured Markdown summaries and vector chunks for extracted clinical documents',
    });
  });

  it('GET /health/storage should report the local output directory', async () => {
    const response = await request(app.getHttpServer()).get('/health/storage');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'healthy',
      driver: 'local',
      location: outputDir,
    });
  });

  it('should set security headers', async () => {
    const response = await request(app.getHttpServer()).get('/');

    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });
});
