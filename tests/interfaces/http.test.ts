import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/server.js';
import { UpdateStateMachine } from '../../src/application/index.js';
import { InMemoryLedger } from '../../src/infrastructure/memory/in-memory-ledger.js';
import { ApplierError, StorageError } from '../../src/domain/index.js';
import { ScriptedApplier, deferred, steppingClock } from '../helpers.js';

const log = pino({ level: 'silent' });

let ledger: InMemoryLedger;
let applier: ScriptedApplier;
let machine: UpdateStateMachine;
let app: FastifyInstance;

beforeEach(async () => {
  ledger = new InMemoryLedger({ now: steppingClock() });
  applier = new ScriptedApplier();
  machine = new UpdateStateMachine({ ledger, applier, log });
  app = await buildServer({ ledger, machine, log });
});

afterEach(async () => {
  await app.close();
});

function applyUpdate(name: string, version?: string | null) {
  return app.inject({ method: 'POST', url: '/api/v1/updates', payload: { name, version } });
}

// ─── POST /api/v1/updates ───────────────────────────────────

describe('POST /api/v1/updates', () => {
  it('returns 201 with the applied record and its events', async () => {
    const res = await applyUpdate('pkg', '1.0');

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.outcome).toBe('applied');
    expect(body.record).toMatchObject({ id: 1, name: 'pkg', version: '1.0', state: 'applied' });
    expect(body.events.map((e: { kind: string }) => e.kind)).toEqual(['update.started', 'update.applied']);
    expect(body.events[0].payload).toEqual({ update_id: 1, name: 'pkg', version: '1.0' });
  });

  it('accepts a missing version', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/updates', payload: { name: 'motd' } });

    expect(res.statusCode).toBe(201);
    expect(res.json().record).toMatchObject({ name: 'motd', version: null });
  });

  it('returns 200 with the error when the applier fails', async () => {
    applier.applyStep = async () => {
      throw new ApplierError('disk full');
    };

    const res = await applyUpdate('pkg', '1.0');

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.outcome).toBe('failed');
    expect(body.error).toBe('disk full');
    expect(body.record.state).toBe('failed');
    expect(body.events[1]).toMatchObject({
      kind: 'update.failed',
      payload: { update_id: 1, name: 'pkg', version: '1.0', error: 'disk full', cancelled: false },
    });
  });

  it('returns 400 when name is missing or blank', async () => {
    const missing = await app.inject({ method: 'POST', url: '/api/v1/updates', payload: { version: '1.0' } });
    const blank = await applyUpdate('   ', '1.0');

    expect(missing.statusCode).toBe(400);
    expect(blank.statusCode).toBe(400);
    expect(Object.keys(blank.json().error.fieldErrors)).toEqual(['name']);
    expect(applier.calls).toHaveLength(0);
  });

  it('returns 409 while the same update is pending', async () => {
    const gate = deferred();
    applier.applyStep = () => gate.promise;

    const first = applyUpdate('pkg', '1.0');
    await vi.waitFor(() => expect(applier.calls).toHaveLength(1));

    const second = await applyUpdate('pkg', '1.0');
    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({
      error: 'An update for pkg@1.0 is already pending',
      code: 'CONFLICT',
    });

    gate.resolve();
    expect((await first).statusCode).toBe(201);
  });
});

// ─── POST /api/v1/updates/:id/rollback ──────────────────────

describe('POST /api/v1/updates/:id/rollback', () => {
  it('rolls back an applied update', async () => {
    await applyUpdate('pkg', '1.0');

    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/1/rollback' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.record).toMatchObject({ id: 1, state: 'rolled_back' });
    expect(body.inverse).toEqual({ ok: true });
    expect(body.events.map((e: { kind: string }) => e.kind)).toEqual([
      'update.rollback_started',
      'update.rolled_back',
    ]);
  });

  it('reports a failed inverse without failing the request', async () => {
    await applyUpdate('pkg', '1.0');
    applier.rollbackStep = async () => {
      throw new ApplierError('inverse exploded');
    };

    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/1/rollback' });

    expect(res.statusCode).toBe(200);
    expect(res.json().inverse).toEqual({ ok: false, error: 'inverse exploded' });
    expect(res.json().record.state).toBe('rolled_back');
  });

  it('returns 409 for an update that is already rolled back', async () => {
    await applyUpdate('pkg', '1.0');
    await app.inject({ method: 'POST', url: '/api/v1/updates/1/rollback' });

    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/1/rollback' });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: 'Illegal transition rolled_back -> rolled_back for update 1',
      code: 'INVALID_TRANSITION',
    });
  });

  it('returns 404 for an unknown id', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/42/rollback' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Update 42 not found', code: 'NOT_FOUND' });
  });

  it('returns 400 for a malformed id', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/abc/rollback' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'id must be a positive integer' });
  });

  it('returns 400 for an id past the id column range', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/updates/3000000000/rollback' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'id must be a positive integer' });
  });
});

// ─── Audit routes ───────────────────────────────────────────

describe('GET /api/v1/updates', () => {
  it('lists records newest first with pagination', async () => {
    await applyUpdate('a', '1');
    await applyUpdate('b', '1');
    await applyUpdate('c', '1');

    const res = await app.inject({ method: 'GET', url: '/api/v1/updates?limit=2' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.map((r: { name: string }) => r.name)).toEqual(['c', 'b']);
    expect(body.pagination).toEqual({ limit: 2, offset: 0, count: 2 });
  });

  it('filters by state', async () => {
    await applyUpdate('a', '1');
    applier.applyStep = async () => {
      throw new ApplierError('nope');
    };
    await applyUpdate('b', '1');

    const res = await app.inject({ method: 'GET', url: '/api/v1/updates?state=failed' });

    expect(res.json().data.map((r: { name: string }) => r.name)).toEqual(['b']);
  });

  it('returns 400 for an unknown state', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/updates?state=bogus' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });
});

describe('GET /api/v1/updates/:id', () => {
  it('returns the record', async () => {
    await applyUpdate('pkg', '1.0');

    const res = await app.inject({ method: 'GET', url: '/api/v1/updates/1' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ id: 1, name: 'pkg', version: '1.0', state: 'applied' });
  });

  it('returns 404 for an unknown id', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/updates/9' });

    expect(res.statusCode).toBe(404);
    expect(res.json().code).toBe('NOT_FOUND');
  });

  it('returns 400 for an id past the id column range', async () => {
    const largest = await app.inject({ method: 'GET', url: '/api/v1/updates/2147483647' });
    const past = await app.inject({ method: 'GET', url: '/api/v1/updates/2147483648' });

    expect(largest.statusCode).toBe(404);
    expect(past.statusCode).toBe(400);
    expect(past.json()).toEqual({ error: 'id must be a positive integer' });
  });
});

describe('GET /api/v1/updates/:id/events', () => {
  it('returns the history with its projected state', async () => {
    await applyUpdate('pkg', '1.0');
    await applyUpdate('other', '2.0');

    const res = await app.inject({ method: 'GET', url: '/api/v1/updates/1/events' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.projected_state).toBe('applied');
    expect(body.data.map((e: { id: number }) => e.id)).toEqual([1, 2]);
  });
});

describe('GET /api/v1/events', () => {
  it('pages through the log after a cursor', async () => {
    await applyUpdate('a', '1');
    await applyUpdate('b', '1');

    const res = await app.inject({ method: 'GET', url: '/api/v1/events?after=1&limit=2' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.map((e: { id: number }) => e.id)).toEqual([2, 3]);
    expect(body.pagination).toEqual({ limit: 2, after: 1, count: 2, next_after: 3 });
  });

  it('returns 400 for a cursor past the id column range', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/events?after=3000000000' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });
});

describe('GET /api/v1/verify', () => {
  it('reports a consistent ledger', async () => {
    await applyUpdate('a', '1');
    await applyUpdate('b', '1');

    const res = await app.inject({ method: 'GET', url: '/api/v1/verify' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ checked: 2, consistent: 2, issues: [] });
  });
});

describe('GET /api/v1/health', () => {
  it('returns ok when the ledger answers', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('returns 503 when the ledger is unreachable', async () => {
    vi.spyOn(ledger.updates, 'list').mockRejectedValue(
      new StorageError('list', new Error('connection refused')),
    );

    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', ledger: 'unreachable' });
  });
});

// ─── POST /api/v1/recovery ──────────────────────────────────

describe('POST /api/v1/recovery', () => {
  it('interrupts records left pending by another process', async () => {
    // a record pending with no live attempt behind it
    await ledger.transaction(async (tx) => {
      const record = await tx.updates.create('stale', '1');
      await tx.events.append('update.started', { update_id: record.id, name: 'stale', version: '1' });
    });

    const res = await app.inject({ method: 'POST', url: '/api/v1/recovery' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ interrupted: [1], reconciled: [], skipped: [], unresolved: [] });

    const record = await app.inject({ method: 'GET', url: '/api/v1/updates/1' });
    expect(record.json().state).toBe('failed');
  });

  it('skips updates the live machine is applying', async () => {
    const gate = deferred();
    applier.applyStep = () => gate.promise;

    const applying = applyUpdate('pkg', '1.0');
    await vi.waitFor(() => expect(applier.calls).toHaveLength(1));

    const res = await app.inject({ method: 'POST', url: '/api/v1/recovery' });
    expect(res.json()).toEqual({ interrupted: [], reconciled: [], skipped: [1], unresolved: [] });

    gate.resolve();
    expect((await applying).json().record.state).toBe('applied');
  });
});
