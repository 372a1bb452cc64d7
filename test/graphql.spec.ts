import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import type { ApolloServer } from '@apollo/server';
import type { LoginUser } from '../src/session-store';
import { buildTestApp } from './support/app';
import { copilotDocument, TEST_EPOCH } from './support/services';

const uploader: LoginUser = {
  token: 'session-u1',
  user: {
    userId: 'u1',
    userName: 'alice',
    email: 'alice@example.test',
    password: 'hashed',
    status: 1,
    createdAt: TEST_EPOCH,
    updatedAt: TEST_EPOCH
  }
};

describe('GraphQL API', () => {
  let apollo: ApolloServer | undefined;

  afterEach(async () => {
    await apollo?.stop();
    apollo = undefined;
  });

  const setup = async () => {
    const built = await buildTestApp();
    apollo = built.apollo;
    return built;
  };

  it('resolves game data lookups', async () => {
    const { app } = await setup();

    const response = await request(app)
      .post('/graphql')
      .send({
        query: `query {
          stage(levelId: "ID_ACT1", code: "s1") { stageId code zoneId }
          zone(levelId: "ID_ACT1", code: "S1", stageId: "act1") { zoneId zoneNameSecond }
          character(characterId: "243") { id name }
          tower(zoneId: "tower_n_1") { name subName }
          activityByZone(zoneId: "zoneB") { id }
        }`
      })
      .expect(200);

    expect(response.body.data).toEqual({
      stage: { stageId: 'act1', code: 'S1', zoneId: 'zoneA' },
      zone: { zoneId: 'zoneA', zoneNameSecond: 'Spring Festival' },
      character: { id: 'char_1_243', name: 'Frostleaf Junior' },
      tower: { name: 'Lone Trail', subName: 'Normal' },
      activityByZone: null
    });
  });

  it('reports the game data status', async () => {
    const { app } = await setup();

    const response = await request(app)
      .post('/graphql')
      .send({ query: '{ gameDataStatus { dataset count lastOutcome { ok levelCount kind } } }' })
      .expect(200);

    expect(response.body.data.gameDataStatus[0]).toEqual({
      dataset: 'stage',
      count: 6,
      lastOutcome: { ok: true, levelCount: 3, kind: null }
    });
  });

  it('queries copilots with filters', async () => {
    const { app, copilotService } = await setup();
    const id = await copilotService.upload(uploader, copilotDocument());

    const response = await request(app)
      .post('/graphql')
      .send({
        query: `query Copilots($operator: String) {
          copilots(operator: $operator, orderBy: views, desc: false) {
            total
            hasNext
            data { id title level { zoneName activityName } operators { name displayName } }
          }
        }`,
        variables: { operator: 'nova' }
      })
      .expect(200);

    expect(response.body.data.copilots).toEqual({
      total: 1,
      hasNext: false,
      data: [
        {
          id,
          title: 'Low rarity clear',
          level: { zoneName: 'Spring Festival', activityName: 'Spring Festival' },
          operators: [
            { name: 'Nova', displayName: 'Nova' },
            { name: 'Frostleaf Junior', displayName: 'Frostleaf Junior' }
          ]
        }
      ]
    });
  });

  it('returns null for a missing copilot and counts views for a found one', async () => {
    const { app, copilotService } = await setup();
    const id = await copilotService.upload(uploader, copilotDocument());

    const missing = await request(app)
      .post('/graphql')
      .send({ query: '{ copilot(id: "missing") { id } }' })
      .expect(200);
    const found = await request(app)
      .post('/graphql')
      .send({ query: `{ copilot(id: "${id}") { id views } }` })
      .expect(200);

    expect(missing.body.data).toEqual({ copilot: null });
    expect(found.body.data).toEqual({ copilot: { id, views: 1 } });
  });

  it('reports invalid copilot query arguments as errors', async () => {
    const { app } = await setup();

    const response = await request(app)
      .post('/graphql')
      .send({ query: '{ copilots(limit: 500) { total } }' })
      .expect(200);

    expect(response.body.errors[0].message).toBe('Number must be less than or equal to 50');
    expect(response.body.errors[0].extensions.code).toBe('BAD_USER_INPUT');
  });
});
