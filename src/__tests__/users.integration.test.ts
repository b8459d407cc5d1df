import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import request from 'supertest';
import { createApp } from '../app.js';
import { createPaginationPolicy } from '../lib/pagination.js';
import { InMemoryUserRepository, type UserRecord } from '../repositories/userRepository.js';

// ── Test fixtures ───────────────────────────────────────────────────────────

// user01 is the oldest, user12 the newest
const users: UserRecord[] = Array.from({ length: 12 }, (_, index) => {
  const n = String(index + 1).padStart(2, '0');
  return {
    id: `user${n}`,
    username: `user${n}`,
    email: `user${n}@example.com`,
    role: index % 3 === 0 ? 'editor' : 'viewer',
    isAdmin: index === 0,
    active: index % 2 === 0,
    createdAt: new Date(Date.UTC(2024, 0, index + 1)),
  };
});

const buildApp = (options: Parameters<typeof createApp>[0] = {}) =>
  createApp({ userRepository: new InMemoryUserRepository(users), ...options });

// ── Tests ───────────────────────────────────────────────────────────────────

describe('GET /api/users', () => {
  it('returns the first page with defaults', async () => {
    const response = await request(buildApp()).get('/api/users');

    assert.equal(response.status, 200);
    assert.equal(response.body.items.length, 10);
    assert.equal(response.body.items[0].id, 'user12');
    assert.equal(response.body.items[0].createdAt, '2024-01-12T00:00:00.000Z');
    assert.deepEqual(
      {
        page: response.body.page,
        pageSize: response.body.pageSize,
        total: response.body.total,
        pages: response.body.pages,
        hasNext: response.body.hasNext,
        hasPrev: response.body.hasPrev,
      },
      { page: 1, pageSize: 10, total: 12, pages: 2, hasNext: true, hasPrev: false }
    );
  });

  it('returns the remainder on the last page', async () => {
    const response = await request(buildApp()).get('/api/users?page=2&page_size=10');

    assert.equal(response.status, 200);
    assert.deepEqual(
      response.body.items.map((u: { id: string }) => u.id),
      ['user02', 'user01']
    );
    assert.equal(response.body.hasNext, false);
    assert.equal(response.body.hasPrev, true);
  });

  it('returns an empty page past the end', async () => {
    const response = await request(buildApp()).get('/api/users?page=9&page_size=5');

    assert.equal(response.status, 200);
    assert.deepEqual(response.body.items, []);
    assert.equal(response.body.pages, 3);
    assert.equal(response.body.hasNext, false);
    assert.equal(response.body.hasPrev, true);
  });

  it('clamps out-of-range page input', async () => {
    const response = await request(buildApp()).get('/api/users?page=-4&page_size=1000');

    assert.equal(response.status, 200);
    assert.equal(response.body.page, 1);
    assert.equal(response.body.pageSize, 100);
    assert.equal(response.body.items.length, 12);
  });

  it('falls back to defaults for malformed input', async () => {
    const response = await request(buildApp()).get('/api/users?page=abc&page_size=xyz');

    assert.equal(response.status, 200);
    assert.equal(response.body.page, 1);
    assert.equal(response.body.pageSize, 10);
  });

  it('applies filters before paginating', async () => {
    const response = await request(buildApp()).get('/api/users?role=editor&page_size=2');

    // editors are user01, user04, user07, user10
    assert.equal(response.status, 200);
    assert.equal(response.body.total, 4);
    assert.equal(response.body.pages, 2);
    assert.deepEqual(
      response.body.items.map((u: { id: string }) => u.id),
      ['user10', 'user07']
    );
  });

  it('parses boolean filters', async () => {
    const response = await request(buildApp()).get('/api/users?is_admin=true');

    assert.equal(response.status, 200);
    assert.equal(response.body.total, 1);
    assert.equal(response.body.items[0].id, 'user01');
  });

  it('matches username exactly', async () => {
    const exact = await request(buildApp()).get('/api/users?username=user03');
    assert.equal(exact.status, 200);
    assert.equal(exact.body.total, 1);
    assert.equal(exact.body.items[0].email, 'user03@example.com');

    const partial = await request(buildApp()).get('/api/users?username=user0');
    assert.equal(partial.status, 200);
    assert.equal(partial.body.total, 0);
    assert.deepEqual(partial.body.items, []);
  });

  it('rejects a malformed boolean filter', async () => {
    const response = await request(buildApp()).get('/api/users?active=yes');

    assert.equal(response.status, 400);
    assert.deepEqual(response.body, {
      success: false,
      error: 'Invalid filter',
      detail: 'active must be true or false',
      code: 'BAD_REQUEST',
    });
  });

  it('rejects malformed page input in strict mode', async () => {
    const app = buildApp({ strictPagination: true });
    const response = await request(app).get('/api/users?page_size=ten');

    assert.equal(response.status, 400);
    assert.deepEqual(response.body, {
      success: false,
      error: 'Invalid pagination parameter',
      detail: 'page_size must be an integer',
      code: 'BAD_REQUEST',
    });
  });

  it('lets strict mode through for well-formed input', async () => {
    const app = buildApp({ strictPagination: true });
    const response = await request(app).get('/api/users?page=2&page_size=5');

    assert.equal(response.status, 200);
    assert.deepEqual(
      response.body.items.map((u: { id: string }) => u.id),
      ['user07', 'user06', 'user05', 'user04', 'user03']
    );
  });

  it('uses the configured pagination policy', async () => {
    const app = buildApp({
      paginationPolicy: createPaginationPolicy({ defaultPageSize: 3, maxPageSize: 5 }),
    });

    const defaults = await request(app).get('/api/users');
    assert.equal(defaults.body.pageSize, 3);
    assert.equal(defaults.body.pages, 4);

    const capped = await request(app).get('/api/users?page_size=50');
    assert.equal(capped.body.pageSize, 5);
  });

  it('echoes the caller request id', async () => {
    const response = await request(buildApp()).get('/api/users').set('x-request-id', 'req-123');

    assert.equal(response.headers['x-request-id'], 'req-123');
  });
});

describe('unknown routes', () => {
  it('returns a 404 error envelope', async () => {
    const response = await request(buildApp()).get('/api/nope');

    assert.equal(response.status, 404);
    assert.deepEqual(response.body, {
      success: false,
      error: 'Route not found',
      detail: 'GET /api/nope',
      code: 'NOT_FOUND',
    });
  });
});

describe('GET /api/health', () => {
  it('returns ok status', async () => {
    const response = await request(createApp()).get('/api/health');

    assert.equal(response.status, 200);
    assert.deepEqual(response.body, { status: 'ok', service: 'pagewise-api' });
  });
});
