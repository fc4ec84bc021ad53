import { describe, it, expect } from 'vitest';
import { InMemoryLedger } from '../../src/infrastructure/memory/in-memory-ledger.js';
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
} from '../../src/domain/index.js';
import type { LedgerEvent } from '../../src/domain/index.js';
import { steppingClock } from '../helpers.js';

async function collect(events: AsyncIterable<LedgerEvent>): Promise<LedgerEvent[]> {
  const out: LedgerEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('InMemoryLedger: event log', () => {
  it('assigns increasing ids and keeps append order', async () => {
    const ledger = new InMemoryLedger({ now: steppingClock() });

    const a = await ledger.events.append('update.started', { update_id: 1 });
    const b = await ledger.events.append('note', null);

    expect(a.id).toBe(1);
    expect(b.id).toBe(2);
    expect((await collect(ledger.events.readAll())).map((e) => e.id)).toEqual([1, 2]);
  });

  it('never lets created_at go backwards', async () => {
    const readings = [new Date('2026-03-01T10:00:05Z'), new Date('2026-03-01T10:00:01Z')];
    let i = 0;
    const ledger = new InMemoryLedger({ now: () => readings[i++] ?? new Date(0) });

    const first = await ledger.events.append('a', null);
    const second = await ledger.events.append('b', null);

    expect(second.created_at.getTime()).toBe(first.created_at.getTime());
  });

  it('stores a copy of the payload', async () => {
    const ledger = new InMemoryLedger();
    const payload = { update_id: 1, tags: ['x'] };

    await ledger.events.append('note', payload);
    payload.tags.push('y');

    const [stored] = await collect(ledger.events.readAll());
    expect(stored?.payload).toEqual({ update_id: 1, tags: ['x'] });
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('pages through readAll and honours afterId', async () => {
    const ledger = new InMemoryLedger();
    for (let n = 0; n < 5; n++) {
      await ledger.events.append('note', { n });
    }

    const all = await collect(ledger.events.readAll({ batchSize: 2 }));
    const tail = await collect(ledger.events.readAll({ afterId: 3, batchSize: 2 }));

    expect(all.map((e) => e.id)).toEqual([1, 2, 3, 4, 5]);
    expect(tail.map((e) => e.id)).toEqual([4, 5]);
  });

  it('returns restartable sequences', async () => {
    const ledger = new InMemoryLedger();
    await ledger.events.append('note', null);
    const sequence = ledger.events.readAll();

    expect(await collect(sequence)).toHaveLength(1);
    await ledger.events.append('note', null);
    expect(await collect(sequence)).toHaveLength(2);
  });

  it('filters by referenced update id', async () => {
    const ledger = new InMemoryLedger();
    await ledger.events.append('update.started', { update_id: 1 });
    await ledger.events.append('update.started', { update_id: 2 });
    await ledger.events.append('update.applied', { update_id: 1 });

    const history = await collect(ledger.events.readByReference(1));
    expect(history.map((e) => e.kind)).toEqual(['update.started', 'update.applied']);
  });
});

describe('InMemoryLedger: update records', () => {
  it('creates pending records with increasing ids', async () => {
    const ledger = new InMemoryLedger();

    const a = await ledger.updates.create('pkg', '1.0');
    const b = await ledger.updates.create('pkg', '2.0');

    expect(a).toMatchObject({ id: 1, name: 'pkg', version: '1.0', state: 'pending', meta: null });
    expect(b.id).toBe(2);
  });

  it('rejects a second pending record for the same identity', async () => {
    const ledger = new InMemoryLedger();
    await ledger.updates.create('pkg', '1.0');

    await expect(ledger.updates.create('pkg', '1.0')).rejects.toThrow(ConflictError);
    await expect(ledger.updates.create('pkg', '1.0')).rejects.toThrow('An update for pkg@1.0 is already pending');
  });

  it('keeps a null version and an empty version apart', async () => {
    const ledger = new InMemoryLedger();
    await ledger.updates.create('pkg', null);

    const empty = await ledger.updates.create('pkg', '');

    expect(empty).toMatchObject({ id: 2, name: 'pkg', version: '', state: 'pending' });
    await expect(ledger.updates.create('pkg', null)).rejects.toThrow('An update for pkg is already pending');
    await expect(ledger.updates.create('pkg', '')).rejects.toThrow('An update for pkg@ is already pending');
  });

  it('allows the same identity once the earlier record left pending', async () => {
    const ledger = new InMemoryLedger();
    const first = await ledger.updates.create('pkg', null);
    await ledger.updates.setState(first.id, 'failed', { error: 'x' });

    const second = await ledger.updates.create('pkg', null);
    expect(second.id).toBe(2);
  });

  it('lets exactly one of two concurrent creates win', async () => {
    const ledger = new InMemoryLedger();

    const results = await Promise.allSettled([
      ledger.updates.create('pkg', '1.0'),
      ledger.updates.create('pkg', '1.0'),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(ConflictError);
  });

  it('get throws NotFoundError for unknown ids', async () => {
    const ledger = new InMemoryLedger();
    await expect(ledger.updates.get(99)).rejects.toThrow(new NotFoundError(99));
  });

  it('setState is a compare-and-swap when expected is passed', async () => {
    const ledger = new InMemoryLedger();
    const record = await ledger.updates.create('pkg', '1.0');

    const applied = await ledger.updates.setState(record.id, 'applied', { duration_ms: 3 }, 'pending');
    expect(applied).toMatchObject({ state: 'applied', meta: { duration_ms: 3 } });

    await expect(ledger.updates.setState(record.id, 'failed', null, 'pending')).rejects.toThrow(
      'Illegal transition applied -> failed for update 1',
    );
    expect((await ledger.updates.get(record.id)).state).toBe('applied');
  });

  it('setState throws NotFoundError for unknown ids', async () => {
    const ledger = new InMemoryLedger();
    await expect(ledger.updates.setState(5, 'applied', null)).rejects.toThrow(NotFoundError);
  });

  it('lists by state oldest first and pages newest first', async () => {
    const ledger = new InMemoryLedger();
    for (const name of ['a', 'b', 'c', 'd']) {
      await ledger.updates.create(name, null);
    }
    await ledger.updates.setState(2, 'applied', null);

    expect((await ledger.updates.listByState('pending')).map((r) => r.id)).toEqual([1, 3, 4]);
    expect((await ledger.updates.list({}, { limit: 2, offset: 1 })).map((r) => r.id)).toEqual([3, 2]);
    expect((await ledger.updates.list({ state: 'pending', name: 'c' }, { limit: 10, offset: 0 })).map((r) => r.id))
      .toEqual([3]);
  });
});

describe('InMemoryLedger: transactions', () => {
  it('commits every write made through the scope', async () => {
    const ledger = new InMemoryLedger();

    const id = await ledger.transaction(async (tx) => {
      const record = await tx.updates.create('pkg', '1.0');
      await tx.events.append('update.started', { update_id: record.id });
      return record.id;
    });

    expect((await ledger.updates.get(id)).state).toBe('pending');
    expect(await collect(ledger.events.readAll())).toHaveLength(1);
  });

  it('rolls back every write when the work throws', async () => {
    const ledger = new InMemoryLedger();
    const record = await ledger.updates.create('pkg', '1.0');

    await expect(
      ledger.transaction(async (tx) => {
        await tx.events.append('update.applied', { update_id: record.id });
        await tx.updates.setState(record.id, 'applied', null, 'pending');
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect((await ledger.updates.get(record.id)).state).toBe('pending');
    expect(await collect(ledger.events.readAll())).toHaveLength(0);
  });

  it('does not reuse event ids after a rollback', async () => {
    const ledger = new InMemoryLedger();

    await ledger
      .transaction(async (tx) => {
        await tx.events.append('note', null);
        throw new InvalidTransitionError('pending', 'rolled_back');
      })
      .catch(() => undefined);
    const next = await ledger.events.append('note', null);

    expect(next.id).toBe(2);
  });

  it('serializes writes behind an open transaction', async () => {
    const ledger = new InMemoryLedger();
    const order: string[] = [];

    const tx = ledger.transaction(async (scope) => {
      await scope.events.append('inside', null);
      order.push('tx');
    });
    const outside = ledger.events.append('outside', null).then(() => order.push('outside'));

    await Promise.all([tx, outside]);
    expect(order).toEqual(['tx', 'outside']);
    expect((await collect(ledger.events.readAll())).map((e) => e.kind)).toEqual(['inside', 'outside']);
  });
});
