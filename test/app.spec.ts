import request from 'supertest';
import type { Express } from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ApolloServer } from '@apollo/server';
import { buildTestApp } from './support/app';
import { copilotDocument, TEST_NONCE } from './support/services';

const signUpAndIn = async (app: Express, email: string, userName: string) => {
  await request(app).post('/auth/sign-up').send({ email, userName, password: 'password-123' }).expect(201);
  const response = await request(app).post('/auth/sign-in').send({ email, password: 'password-123' }).expect(200);
  return `Bearer ${response.body.token}`;
};

describe('HTTP API', () => {
  let app: Express;
  let apollo: ApolloServer;

  beforeEach(async () => {
    ({ app, apollo } = await buildTestApp());
  });

  afterEach(async () => {
    await apollo.stop();
  });

  it('reports health with the game data status', async () => {
    const response = await request(app).get('/health').expect(200);

    expect(response.body.status).toBe('healthy');
    expect(response.body.gameData.map((entry: { dataset: string }) => entry.dataset)).toEqual([
      'stage',
      'zone',
      'activity',
      'character',
      'tower'
    ]);
  });

  it('answers unknown routes with 404', async () => {
    const response = await request(app).get('/nope').expect(404);

    expect(response.body).toEqual({ error: 'Not found' });
  });

  it('rejects malformed JSON bodies', async () => {
    const response = await request(app)
      .post('/auth/sign-in')
      .set('Content-Type', 'application/json')
      .send('{"email":')
      .expect(400);

    expect(response.body).toEqual({ error: 'Malformed JSON body' });
  });

  describe('accounts', () => {
    it('validates the sign-up body', async () => {
      const response = await request(app).post('/auth/sign-up').send({}).expect(400);

      expect(response.body).toEqual({ error: 'email: Required; userName: Required; password: Required' });
    });

    it('signs up, normalises the email and refuses duplicates', async () => {
      const created = await request(app)
        .post('/auth/sign-up')
        .send({ email: ' Reader@Example.test ', userName: 'reader', password: 'password-123' })
        .expect(201);
      expect(created.body).toMatchObject({ userName: 'reader', activated: false });

      const duplicate = await request(app)
        .post('/auth/sign-up')
        .send({ email: 'reader@example.test', userName: 'again', password: 'password-123' })
        .expect(409);
      expect(duplicate.body).toEqual({ error: 'User already exists', code: 10001 });
    });

    it('requires a valid bearer token on protected routes', async () => {
      await request(app).post('/auth/refresh').expect(401, { error: 'Unauthorized' });
      await request(app).post('/auth/refresh').set('Authorization', 'Bearer nonsense').expect(401);

      const bearer = await signUpAndIn(app, 'reader@example.test', 'reader');
      const refreshed = await request(app).post('/auth/refresh').set('Authorization', bearer).expect(200);
      expect(refreshed.body.userInfo.userName).toBe('reader');
    });

    it('accepts the token from the accessToken cookie', async () => {
      const bearer = await signUpAndIn(app, 'reader@example.test', 'reader');

      await request(app)
        .post('/auth/refresh')
        .set('Cookie', `accessToken=${bearer.slice('Bearer '.length)}`)
        .expect(200);
    });

    it('updates the profile of the signed-in user', async () => {
      const bearer = await signUpAndIn(app, 'reader@example.test', 'reader');

      const response = await request(app)
        .post('/user/update/info')
        .set('Authorization', bearer)
        .send({ userName: 'renamed' })
        .expect(200);

      expect(response.body).toMatchObject({ userName: 'renamed' });
    });

    it('activates an account through the emailed link', async () => {
      await signUpAndIn(app, 'reader@example.test', 'reader');

      await request(app).get('/user/activateAccount').query({ nonce: TEST_NONCE }).expect(200, { status: 'activated' });
      await request(app)
        .get('/user/activateAccount')
        .query({ nonce: TEST_NONCE })
        .expect(400, { error: 'Activation link has expired' });
    });

    it('reports an unknown email on password reset', async () => {
      const response = await request(app)
        .post('/user/password/reset_request')
        .send({ email: 'ghost@example.test' })
        .expect(404);

      expect(response.body).toEqual({ error: 'User not found', code: 10002 });
    });
  });

  describe('copilots', () => {
    it('uploads, reads and queries a copilot', async () => {
      const bearer = await signUpAndIn(app, 'reader@example.test', 'reader');

      await request(app).post('/copilot/upload').send({ content: copilotDocument() }).expect(401);
      const uploaded = await request(app)
        .post('/copilot/upload')
        .set('Authorization', bearer)
        .send({ content: copilotDocument() })
        .expect(201);
      const id: string = uploaded.body.id;

      const fetched = await request(app).get(`/copilot/get/${id}`).expect(200);
      expect(fetched.body).toMatchObject({ id, views: 1, level: { stageId: 'act1', zoneName: 'Spring Festival' } });

      const page = await request(app).get('/copilot/query').query({ operator: 'nova', limit: 5 }).expect(200);
      expect(page.body).toMatchObject({ total: 1, page: 1, hasNext: false });
      expect(page.body.data[0].id).toBe(id);
    });

    it('refuses changes from other users', async () => {
      const owner = await signUpAndIn(app, 'owner@example.test', 'owner');
      const other = await signUpAndIn(app, 'other@example.test', 'other');
      const uploaded = await request(app)
        .post('/copilot/upload')
        .set('Authorization', owner)
        .send({ content: copilotDocument() })
        .expect(201);

      await request(app)
        .post('/copilot/delete')
        .set('Authorization', other)
        .send({ id: uploaded.body.id })
        .expect(403, { error: 'Only the uploader can modify this copilot' });
      await request(app)
        .post('/copilot/delete')
        .set('Authorization', owner)
        .send({ id: uploaded.body.id })
        .expect(200, { id: uploaded.body.id, status: 'deleted' });
      await request(app).get(`/copilot/get/${uploaded.body.id}`).expect(404, { error: 'Copilot not found' });
    });

    it('rejects invalid query parameters', async () => {
      const response = await request(app).get('/copilot/query').query({ limit: 500 }).expect(400);

      expect(response.body).toEqual({ error: 'limit: Number must be less than or equal to 50' });
    });
  });

  describe('game data', () => {
    it('looks up stages, zones and characters', async () => {
      const stage = await request(app).get('/arknights/stage').query({ levelId: 'ID_ACT1', code: 'S1' }).expect(200);
      expect(stage.body.stageId).toBe('act1');

      const zone = await request(app)
        .get('/arknights/zone')
        .query({ levelId: 'ID_ACT1', code: 'S1', stageId: 'act1' })
        .expect(200);
      expect(zone.body.zoneId).toBe('zoneA');

      const character = await request(app).get('/arknights/character/char_1_243').expect(200);
      expect(character.body).toEqual({
        id: 'char_1_243',
        name: 'Frostleaf Junior',
        profession: 'WARRIOR',
        rarity: '3'
      });

      await request(app).get('/arknights/activity/zoneA').expect(200);
      await request(app).get('/arknights/tower/tower_n_1').expect(200);
    });

    it('answers misses with 404', async () => {
      await request(app).get('/arknights/stage').query({ stageId: 'missing' }).expect(404, { error: 'Stage not found' });
      await request(app).get('/arknights/activity/zoneB').expect(404, { error: 'Activity not found' });
      await request(app).get('/arknights/tower/zoneA').expect(404, { error: 'Tower not found' });
    });

    it('reports the status of every dataset', async () => {
      const response = await request(app).get('/arknights/status').expect(200);

      expect(response.body.datasets[0]).toMatchObject({ dataset: 'stage', count: 6, lastOutcome: { ok: true } });
    });

    it('only syncs on request with the admin token', async () => {
      await request(app).post('/arknights/sync').expect(403, { error: 'Forbidden' });
      await request(app).post('/arknights/sync').set('x-admin-token', 'wrong').expect(403);

      const all = await request(app).post('/arknights/sync').set('x-admin-token', 'test-admin-token').expect(200);
      expect(all.body.outcomes).toHaveLength(5);

      const one = await request(app)
        .post('/arknights/sync')
        .query({ dataset: 'zone' })
        .set('x-admin-token', 'test-admin-token')
        .expect(200);
      expect(one.body.outcomes).toEqual([expect.objectContaining({ dataset: 'zone', ok: true, count: 2 })]);

      await request(app)
        .post('/arknights/sync')
        .query({ dataset: 'bogus' })
        .set('x-admin-token', 'test-admin-token')
        .expect(400);
    });

    it('refuses every sync when no admin token is configured', async () => {
      await apollo.stop();
      ({ app, apollo } = await buildTestApp(null));

      await request(app).post('/arknights/sync').set('x-admin-token', 'test-admin-token').expect(403);
    });
  });
});
