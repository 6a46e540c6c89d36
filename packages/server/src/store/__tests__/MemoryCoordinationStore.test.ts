import { MemoryCoordinationStore } from '../MemoryCoordinationStore';
import { BadVersionError, NoNodeError, NodeExistsError } from '../errors';

const text = (data: Uint8Array) => Buffer.from(data).toString('utf8');

describe('MemoryCoordinationStore', () => {
  let store: MemoryCoordinationStore;

  beforeEach(() => {
    store = new MemoryCoordinationStore();
  });

  it('should create nodes at version 0', async () => {
    await store.create('/a', Buffer.from('one'));

    expect(await store.exists('/a')).toBe(true);
    const { data, version } = await store.read('/a');
    expect(text(data)).toBe('one');
    expect(version).toBe(0);
  });

  it('should reject a second create', async () => {
    await store.create('/a', Buffer.from('one'));
    await expect(store.create('/a', Buffer.from('two'))).rejects.toThrow(NodeExistsError);
    expect(text((await store.read('/a')).data)).toBe('one');
  });

  it('should report missing nodes', async () => {
    expect(await store.exists('/missing')).toBe(false);
    await expect(store.read('/missing')).rejects.toThrow(NoNodeError);
    await expect(store.conditionalWrite('/missing', Buffer.from('x'), 0)).rejects.toThrow(NoNodeError);
  });

  it('should bump the version on each conditional write', async () => {
    await store.create('/a', Buffer.from('v0'));

    await expect(store.conditionalWrite('/a', Buffer.from('v1'), 0)).resolves.toBe(1);
    await expect(store.conditionalWrite('/a', Buffer.from('v2'), 1)).resolves.toBe(2);

    const { data, version } = await store.read('/a');
    expect(text(data)).toBe('v2');
    expect(version).toBe(2);
  });

  it('should reject a stale version without applying it', async () => {
    await store.create('/a', Buffer.from('v0'));
    await store.conditionalWrite('/a', Buffer.from('v1'), 0);

    const error = await store.conditionalWrite('/a', Buffer.from('stale'), 0).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BadVersionError);
    expect(error).toMatchObject({ path: '/a', expectedVersion: 0 });
    expect(text((await store.read('/a')).data)).toBe('v1');
  });

  it('should copy payloads in and out', async () => {
    const payload = Buffer.from('abc');
    await store.create('/a', payload);
    payload[0] = 0x7a;

    const first = await store.read('/a');
    first.data[1] = 0x7a;

    expect(text((await store.read('/a')).data)).toBe('abc');
  });

  it('should count operations and successful writes', async () => {
    await store.create('/a', Buffer.from('v0'));
    await store.conditionalWrite('/a', Buffer.from('v1'), 5).catch(() => undefined);
    await store.exists('/a');
    await store.read('/a');

    expect(store.getStats()).toEqual({
      exists: 1,
      read: 1,
      conditionalWrite: 1,
      create: 1,
      atomicUpdate: 0,
      writes: 1,
    });

    store.resetStats();
    expect(store.getStats().writes).toBe(0);
  });

  it('should apply atomic updates', async () => {
    await store.atomicUpdate('/a', (current) => (current === null ? Buffer.from('first') : null));
    await store.atomicUpdate('/a', (current) => Buffer.from(`${text(current ?? new Uint8Array())}+second`));

    expect(text((await store.read('/a')).data)).toBe('first+second');
    expect(store.getStats().atomicUpdate).toBe(2);
  });

  it('should delete nodes and list paths', async () => {
    await store.create('/a', Buffer.from('1'));
    await store.create('/b', Buffer.from('2'));

    expect(await store.delete('/a')).toBe(true);
    expect(await store.delete('/a')).toBe(false);
    expect(store.listPaths()).toEqual(['/b']);
  });

  it('should drop everything on close', async () => {
    await store.create('/a', Buffer.from('1'));
    await store.close();
    expect(await store.exists('/a')).toBe(false);
  });
});
