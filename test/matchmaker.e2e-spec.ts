import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { LivenessRegistryService } from '../src/modules/matchmaker/liveness-registry.service';
import { createE2eApp } from './e2e-app';
import { FakeClock, closeApp } from './helpers';

describe('Matchmaker API (e2e)', () => {
  let app: INestApplication;
  let clock: FakeClock;

  beforeEach(async () => {
    ({ app, clock } = await createE2eApp());
  });

  afterEach(async () => {
    await closeApp(app);
  });

  async function register(body: Record<string, unknown> = {}): Promise<string> {
    const res = await request(app.getHttpServer())
      .post('/v1/matchmaker/servers')
      .send({ ip: '10.0.0.5', port: 9100, name: 'Click Race', ...body })
      .expect(200);
    return res.body.result.serverId;
  }

  it('registers a server with defaults', async () => {
    const res = await request(app.getHttpServer())
      .post('/v1/matchmaker/servers')
      .send({ ip: '10.0.0.5', port: 9100, name: 'Click Race', serverId: 'gs-click-1' })
      .expect(200);

    expect(res.body).toEqual({
      success: true,
      result: {
        serverId: 'gs-click-1',
        ip: '10.0.0.5',
        port: 9100,
        name: 'Click Race',
        maxPlayers: 20,
        currentPlayers: 0,
        metadata: {},
        registeredAt: '2026-01-01T00:00:00.000Z',
        lastHeartbeat: '2026-01-01T00:00:00.000Z',
        active: true,
        uptimeSeconds: 0,
      },
    });
  });

  it('rejects an out-of-range port', async () => {
    const res = await request(app.getHttpServer())
      .post('/v1/matchmaker/servers')
      .send({ ip: '10.0.0.5', port: 70000, name: 'x' })
      .expect(400);
    expect(res.body.error.code).toBe('INVALID_REQUEST');
  });

  it('rejects a malformed ip', async () => {
    const res = await request(app.getHttpServer())
      .post('/v1/matchmaker/servers')
      .send({ ip: 'game.example', port: 9100, name: 'x' })
      .expect(400);
    expect(res.body.error).toMatchObject({ code: 'INVALID_REQUEST', message: 'ip must be an ip address' });
  });

  it('updates player count on heartbeat', async () => {
    const id = await register();
    clock.advance(5_000);

    const res = await request(app.getHttpServer())
      .post(`/v1/matchmaker/servers/${id}/heartbeat`)
      .send({ currentPlayers: 3 })
      .expect(200);

    expect(res.body.result).toMatchObject({
      currentPlayers: 3,
      lastHeartbeat: '2026-01-01T00:00:05.000Z',
      uptimeSeconds: 5,
    });
  });

  it('answers 404 to a heartbeat for an unknown server', async () => {
    const res = await request(app.getHttpServer())
      .post('/v1/matchmaker/servers/mm-unknown/heartbeat')
      .send({})
      .expect(404);
    expect(res.body.error.message).toBe('Matchmaker server not found: mm-unknown');
  });

  it('hides a lapsed server, answers 410, then 404 once swept', async () => {
    const id = await register();
    clock.advance(30_000);

    const listed = await request(app.getHttpServer()).get('/v1/matchmaker/servers').expect(200);
    expect(listed.body.result).toEqual([]);

    const all = await request(app.getHttpServer()).get('/v1/matchmaker/servers?activeOnly=false').expect(200);
    expect(all.body.result.map((e: { serverId: string; active: boolean }) => [e.serverId, e.active])).toEqual([
      [id, false],
    ]);

    const gone = await request(app.getHttpServer()).get(`/v1/matchmaker/servers/${id}`).expect(410);
    expect(gone.body.error).toEqual({
      code: 'GONE',
      message: `Matchmaker server is inactive: ${id}`,
      retryable: false,
      details: { id },
    });

    expect(app.get(LivenessRegistryService).sweep()).toBe(1);
    await request(app.getHttpServer()).get(`/v1/matchmaker/servers/${id}`).expect(404);
  });

  it('unregisters a server', async () => {
    const id = await register();
    const res = await request(app.getHttpServer()).delete(`/v1/matchmaker/servers/${id}`).expect(200);
    expect(res.body.result).toEqual({ serverId: id });

    await request(app.getHttpServer()).delete(`/v1/matchmaker/servers/${id}`).expect(404);
  });
});
