import { Test, TestingModule } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

/**
 * CRUD over /api/test against an in-memory SQLite database
 * (DATABASE_PATH=:memory: from test/setup.ts).
 */
describe('Test Projects (e2e)', () => {
  let app: NestFastifyApplication;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter({ ignoreTrailingSlash: true }),
    );
    configureApp(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function createProject(name: string): Promise<{ Id: number }> {
    const result = await app.inject({
      method: 'POST',
      url: '/api/test',
      payload: { Name: name },
    });
    return JSON.parse(result.payload) as { Id: number };
  }

  it('lists nothing on a fresh database', async () => {
    const result = await app.inject({ method: 'GET', url: '/api/test' });

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.payload)).toEqual([]);
  });

  it('creates a project with 201', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/test',
      payload: { Name: 'Alpha' },
    });

    expect(result.statusCode).toBe(201);
    expect(JSON.parse(result.payload)).toEqual({ Id: 1, Name: 'Alpha' });
  });

  it('runs the full create, read, update, delete cycle', async () => {
    const { Id } = await createProject('Alpha');

    const read = await app.inject({ method: 'GET', url: `/api/test/${Id}` });
    expect(read.statusCode).toBe(200);
    expect(JSON.parse(read.payload)).toEqual({ Id, Name: 'Alpha' });

    const updated = await app.inject({
      method: 'PUT',
      url: `/api/test/${Id}`,
      payload: { Name: 'Renamed' },
    });
    expect(updated.statusCode).toBe(200);
    expect(JSON.parse(updated.payload)).toEqual({ Id, Name: 'Renamed' });

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/api/test/${Id}`,
    });
    expect(deleted.statusCode).toBe(200);
    expect(JSON.parse(deleted.payload)).toEqual({
      message: 'Deleted successfully',
    });

    const gone = await app.inject({ method: 'GET', url: `/api/test/${Id}` });
    expect(gone.statusCode).toBe(404);
  });

  it('lists projects in id order', async () => {
    await createProject('Alpha');
    await createProject('Beta');

    const result = await app.inject({ method: 'GET', url: '/api/test' });

    expect(JSON.parse(result.payload)).toEqual([
      { Id: 1, Name: 'Alpha' },
      { Id: 2, Name: 'Beta' },
    ]);
  });

  it('ignores a trailing slash', async () => {
    await createProject('Alpha');

    const result = await app.inject({ method: 'GET', url: '/api/test/1/' });

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.payload)).toEqual({ Id: 1, Name: 'Alpha' });
  });

  it.each([
    ['GET', '/api/test/abc'],
    ['PUT', '/api/test/1.5'],
    ['DELETE', '/api/test/x1'],
  ] as const)('rejects %s %s with 400 Invalid ID', async (method, url) => {
    const result = await app.inject({
      method,
      url,
      payload: method === 'PUT' ? { Name: 'Alpha' } : undefined,
    });

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.payload)).toEqual({
      statusCode: 400,
      message: 'Invalid ID',
      error: 'Bad Request',
    });
  });

  it.each([
    ['GET', undefined],
    ['PUT', { Name: 'Nobody' }],
    ['DELETE', undefined],
  ] as const)('returns 404 for %s on an unknown id', async (method, payload) => {
    const result = await app.inject({ method, url: '/api/test/99', payload });

    expect(result.statusCode).toBe(404);
    expect(JSON.parse(result.payload)).toEqual({
      statusCode: 404,
      message: 'Project not found',
      error: 'Not Found',
    });
  });

  it('rejects a body without Name', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/test',
      payload: { Title: 'Alpha' },
    });

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.payload)).toMatchObject({
      statusCode: 400,
      error: 'Bad Request',
    });
  });

  it('rejects malformed JSON', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/test',
      headers: { 'content-type': 'application/json' },
      payload: '{"Name":',
    });

    expect(result.statusCode).toBe(400);
  });
});
