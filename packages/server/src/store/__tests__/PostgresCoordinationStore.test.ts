import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import { PostgresCoordinationStore } from '../PostgresCoordinationStore';
import { BadVersionError, NoNodeError, NodeExistsError } from '../errors';
import { ClusterProperties } from '../../ClusterProperties';
import { CoordinationSlotGuard } from '../../disruption/CoordinationSlotGuard';

const text = (data: Uint8Array) => Buffer.from(data).toString('utf8');

describe('PostgresCoordinationStore (Integration via pg-mem)', () => {
  let store: PostgresCoordinationStore;
  let pool: Pool;

  beforeEach(async () => {
    const db = newDb();
    const { Pool } = db.adapters.createPg();
    pool = new Pool();
    store = new PostgresCoordinationStore(pool);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  test('should initialize and create table', async () => {
    const res = await pool.query(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name = 'clusterprops_nodes'
    `);
    expect(res.rows.length).toBe(1);
  });

  test('should reject invalid table names', () => {
    expect(() => new PostgresCoordinationStore(pool, { tableName: 'invalid-name' }))
      .toThrow('Invalid table name');
    expect(() => new PostgresCoordinationStore(pool, { tableName: 'nodes; DROP TABLE users;' }))
      .toThrow('Invalid table name');
    expect(() => new PostgresCoordinationStore(pool, { tableName: '' }))
      .toThrow('Invalid table name');
  });

  test('should create and read a node at version 0', async () => {
    await store.create('/clusterprops.json', Buffer.from('{"a":"1"}'));

    expect(await store.exists('/clusterprops.json')).toBe(true);
    const { data, version } = await store.read('/clusterprops.json');
    expect(text(data)).toBe('{"a":"1"}');
    expect(version).toBe(0);
  });

  test('should keep arbitrary bytes intact', async () => {
    const payload = new Uint8Array([0, 255, 10, 128]);
    await store.create('/bin', payload);

    expect(Array.from((await store.read('/bin')).data)).toEqual([0, 255, 10, 128]);
  });

  test('should reject a second create', async () => {
    await store.create('/n', Buffer.from('first'));

    await expect(store.create('/n', Buffer.from('second'))).rejects.toThrow(NodeExistsError);
    expect(text((await store.read('/n')).data)).toBe('first');
  });

  test('should let exactly one of two racing creates win', async () => {
    const results = await Promise.allSettled([
      store.create('/race', Buffer.from('first')),
      store.create('/race', Buffer.from('second')),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected?.reason).toBeInstanceOf(NodeExistsError);
    expect((await store.read('/race')).version).toBe(0);
  });

  test('should propagate insert failures other than an existing node', async () => {
    const uninitialized = new PostgresCoordinationStore(pool, { tableName: 'missing_nodes' });

    const failure = uninitialized.create('/n', Buffer.from('x'));
    await expect(failure).rejects.toThrow();
    await expect(failure).rejects.not.toBeInstanceOf(NodeExistsError);
  });

  test('should grant a disruption tick to one of two guards', async () => {
    const a = new CoordinationSlotGuard(store, { claimPath: '/disruptions/gc', nodeId: 'node-a' });
    const b = new CoordinationSlotGuard(store, { claimPath: '/disruptions/gc', nodeId: 'node-b' });

    const results = await Promise.all([a.tryAcquireSlot(1000), b.tryAcquireSlot(1000)]);
    expect(results.filter(Boolean)).toHaveLength(1);

    const next = await Promise.all([a.tryAcquireSlot(2000), b.tryAcquireSlot(2000)]);
    expect(next.filter(Boolean)).toHaveLength(1);

    const res = await pool.query('SELECT node_path FROM clusterprops_nodes');
    expect(res.rows).toEqual([{ node_path: '/disruptions/gc' }]);
  });

  test('should keep both values when two clients create the document at once', async () => {
    const writer = () => new ClusterProperties(store);

    await Promise.all([
      writer().setProperty('urlScheme', 'https'),
      writer().setProperty('maxShards', '5'),
    ]);

    expect(await writer().getProperties()).toEqual({ urlScheme: 'https', maxShards: '5' });
  });

  test('should report missing nodes', async () => {
    expect(await store.exists('/missing')).toBe(false);
    await expect(store.read('/missing')).rejects.toThrow(NoNodeError);
    await expect(store.conditionalWrite('/missing', Buffer.from('x'), 0)).rejects.toThrow(NoNodeError);
  });

  test('should write conditionally on the current version', async () => {
    await store.create('/n', Buffer.from('v0'));

    await expect(store.conditionalWrite('/n', Buffer.from('v1'), 0)).resolves.toBe(1);
    await expect(store.conditionalWrite('/n', Buffer.from('stale'), 0)).rejects.toThrow(BadVersionError);

    const { data, version } = await store.read('/n');
    expect(text(data)).toBe('v1');
    expect(version).toBe(1);
  });

  test('should apply atomic updates', async () => {
    await store.atomicUpdate('/n', () => Buffer.from('one'));
    await store.atomicUpdate('/n', (current) => Buffer.from(`${text(current ?? new Uint8Array())},two`));
    await store.atomicUpdate('/n', () => null);

    const { data, version } = await store.read('/n');
    expect(text(data)).toBe('one,two');
    expect(version).toBe(1);
  });

  test('should back ClusterProperties end to end', async () => {
    const client = new ClusterProperties(store);

    await client.setProperty('maxShards', '5');
    await client.setProperties({ defaults: { collection: { numShards: 2 } } });
    await client.setProperty('maxShards', null);

    expect(await client.getProperties()).toEqual({ defaults: { collection: { numShards: 2 } } });
    expect(await client.getProperty('defaults/collection/numShards', 1)).toBe(2);
    expect((await store.read('/clusterprops.json')).version).toBe(2);
  });
});
