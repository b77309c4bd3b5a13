import { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { createRailwayClientConfig, RAILWAY_CLIENT_CONFIG } from '../src/railway/railway.config';
import { NO_MATCH_MESSAGE } from '../src/update/update.response';
import {
  FakeServiceInstance,
  graphqlErrorResponse,
  mockRailwayApi,
  mutationResponse,
  serviceInstancesResponse,
} from './railway-api.mock';

const PROJECT_ID = '550e8400-e29b-41d4-a716-446655440000';
const ENVIRONMENT_ID = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

const validBody = {
  project_id: PROJECT_ID,
  environment_id: ENVIRONMENT_ID,
  image_prefixes: ['myapp'],
  new_version: 'v2',
};

describe('Image version updater (e2e)', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(RAILWAY_CLIENT_CONFIG)
      .useValue(createRailwayClientConfig({ apiToken: 'test-token', apiUrl: 'http://railway.test/graphql' }))
      .compile();

    app = configureApp(moduleRef.createNestApplication<NestExpressApplication>({ logger: false }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function railwayWith(instances: FakeServiceInstance[], failingService?: string) {
    return mockRailwayApi(({ operationName, variables }) => {
      switch (operationName) {
        case 'EnvironmentServices':
          return serviceInstancesResponse(instances);
        case 'ServiceInstanceUpdate':
          return variables.serviceId === failingService
            ? graphqlErrorResponse('Service not found')
            : mutationResponse('serviceInstanceUpdate');
        default:
          return mutationResponse('serviceInstanceDeploy');
      }
    });
  }

  describe('GET /health', () => {
    it('reports ok', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'ok' });
    });
  });

  describe('PUT /update', () => {
    it.each(['get', 'post', 'patch', 'delete'] as const)('rejects %s with 405', async (method) => {
      const response = await request(app.getHttpServer())[method]('/update').expect(405);

      expect(response.body).toEqual({ error: 'Method not allowed, use PUT' });
    });

    it('rejects malformed JSON', async () => {
      const response = await request(app.getHttpServer())
        .put('/update')
        .set('Content-Type', 'application/json')
        .send('invalid json')
        .expect(400);

      expect(typeof response.body.error).toBe('string');
      expect(response.body.error).not.toBe('');
    });

    const invalidBodies: Array<[Partial<typeof validBody>, string]> = [
      [{ project_id: 'invalid-uuid' }, 'Invalid project_id: must be a valid UUID'],
      [{ environment_id: 'invalid-uuid' }, 'Invalid environment_id: must be a valid UUID'],
      [{ project_id: 'invalid-uuid', environment_id: 'invalid-uuid' }, 'Invalid project_id: must be a valid UUID'],
      [{ image_prefixes: [] }, 'image_prefixes cannot be empty'],
      [{ image_prefixes: ['myapp', ''] }, 'image_prefixes must contain only non-empty strings'],
      [{ new_version: '' }, 'new_version cannot be empty'],
    ];

    it.each(invalidBodies)('rejects %j', async (overrides, message) => {
      const response = await request(app.getHttpServer())
        .put('/update')
        .send({ ...validBody, ...overrides })
        .expect(400);

      expect(response.body).toEqual({ error: message });
    });

    it.each([
      ['missing', { project_id: PROJECT_ID, environment_id: ENVIRONMENT_ID, new_version: 'v2' }],
      ['null', { ...validBody, image_prefixes: null }],
    ])('treats a %s image_prefixes as empty', async (_label, body) => {
      const response = await request(app.getHttpServer()).put('/update').send(body).expect(400);

      expect(response.body).toEqual({ error: 'image_prefixes cannot be empty' });
    });

    it('reads a JSON body sent with another content type', async () => {
      railwayWith([{ serviceId: 'svc-redis', serviceName: 'redis', image: 'redis:7' }]);

      const response = await request(app.getHttpServer())
        .put('/update')
        .set('Content-Type', 'text/plain')
        .send(JSON.stringify(validBody))
        .expect(200);

      expect(response.body).toEqual({ message: NO_MATCH_MESSAGE, updated_services: [] });
    });

    it('rejects a body without fields, naming project_id first', async () => {
      const response = await request(app.getHttpServer()).put('/update').send({}).expect(400);

      expect(response.body).toEqual({ error: 'Invalid project_id: must be a valid UUID' });
    });

    it('reports when no service matches', async () => {
      const calls = railwayWith([{ serviceId: 'svc-redis', serviceName: 'redis', image: 'redis:7' }]);

      const response = await request(app.getHttpServer()).put('/update').send(validBody).expect(200);

      expect(response.body).toEqual({ message: NO_MATCH_MESSAGE, updated_services: [] });
      expect(calls.map((call) => call.operationName)).toEqual(['EnvironmentServices']);
    });

    it('updates and redeploys every matching service', async () => {
      const calls = railwayWith([
        {
          serviceId: 'svc-api',
          serviceName: 'api',
          image: 'myapp:v1.0.0',
          meta: JSON.stringify({
            serviceManifest: { deploy: { multiRegionConfig: { 'us-east4': { numReplicas: 3 } } } },
          }),
        },
        { serviceId: 'svc-postgres', serviceName: 'postgres', image: null },
        { serviceId: 'svc-worker', serviceName: 'worker', image: 'myapp-worker' },
      ]);

      const response = await request(app.getHttpServer())
        .put('/update')
        .send({ ...validBody, environment_id: `{${ENVIRONMENT_ID}}` })
        .expect(200);

      expect(response.body).toEqual({
        message: 'Successfully updated 2 service(s)',
        updated_services: ['api', 'worker'],
      });
      expect(calls.map((call) => [call.operationName, call.variables.serviceId])).toEqual([
        ['EnvironmentServices', undefined],
        ['ServiceInstanceUpdate', 'svc-api'],
        ['ServiceInstanceDeploy', 'svc-api'],
        ['ServiceInstanceUpdate', 'svc-worker'],
        ['ServiceInstanceDeploy', 'svc-worker'],
      ]);
      expect(calls[1].variables.input).toEqual({ source: { image: 'myapp:v2' }, numReplicas: 3 });
      expect(calls[3].variables.input).toEqual({ source: { image: 'myapp-worker:v2' }, numReplicas: 1 });
    });

    it('reports the services updated before a failure', async () => {
      railwayWith(
        [
          { serviceId: 'svc-api', serviceName: 'api', image: 'myapp-api:v1' },
          { serviceId: 'svc-worker', serviceName: 'worker', image: 'myapp-worker:v1' },
          { serviceId: 'svc-cron', serviceName: 'cron', image: 'myapp-cron:v1' },
        ],
        'svc-worker',
      );

      const response = await request(app.getHttpServer()).put('/update').send(validBody).expect(500);

      expect(response.body).toEqual({
        error:
          'Failed to update services: failed to update service worker: failed to update service instance: GraphQL error: Service not found',
        updated_services: ['api'],
      });
    });

    it('reports a failure to list services', async () => {
      mockRailwayApi(() => ({ status: 503, body: 'unavailable' }));

      const response = await request(app.getHttpServer()).put('/update').send(validBody).expect(500);

      expect(response.body).toEqual({
        error: 'Failed to update services: failed to get services: API returned status 503: unavailable',
        updated_services: [],
      });
    });
  });
});
