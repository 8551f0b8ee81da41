import { InMemoryLicenseStore } from '../stores/memory-license-store';
import { PersistenceError } from '../../errors/base.error';

describe('InMemoryLicenseStore', () => {
  let store: InMemoryLicenseStore;

  const t1 = new Date('2024-03-01T09:00:00.000Z');
  const t2 = new Date('2024-03-02T09:00:00.000Z');

  beforeEach(() => {
    store = new InMemoryLicenseStore();
  });

  it('should assign ids from 1 in insertion order', async () => {
    const inserted = await store.insertAll([
      { key: 'KEY-A', createdAt: t1 },
      { key: 'KEY-B', createdAt: t1 },
    ]);

    expect(inserted.map(r => r.id)).toEqual([1, 2]);
    expect(await store.count()).toBe(2);
  });

  it('should reject the whole batch on a duplicate key', async () => {
    await store.insertAll([{ key: 'KEY-A', createdAt: t1 }]);

    await expect(
      store.insertAll([
        { key: 'KEY-B', createdAt: t2 },
        { key: 'KEY-A', createdAt: t2 },
      ])
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(await store.count()).toBe(1);
    expect(await store.exists('KEY-B')).toBe(false);
  });

  it('should reject a batch that repeats a key within itself', async () => {
    await expect(
      store.insertAll([
        { key: 'KEY-A', createdAt: t1 },
        { key: 'KEY-A', createdAt: t1 },
      ])
    ).rejects.toMatchObject({ reason: 'duplicate_key' });

    expect(await store.count()).toBe(0);
  });

  it('should list newest first, breaking ties by id', async () => {
    await store.insertAll([
      { key: 'KEY-A', createdAt: t1 },
      { key: 'KEY-B', createdAt: t1 },
    ]);
    await store.insertAll([{ key: 'KEY-C', createdAt: t2 }]);

    expect((await store.listAll()).map(r => r.key)).toEqual(['KEY-C', 'KEY-B', 'KEY-A']);
  });

  it('should stamp a late arrival with the newest stored time', async () => {
    await store.insertAll([{ key: 'KEY-A', createdAt: t2 }]);
    const [late] = await store.insertAll([{ key: 'KEY-B', createdAt: t1 }]);

    expect(late?.createdAt).toEqual(t2);
    expect((await store.listAll()).map(r => r.key)).toEqual(['KEY-B', 'KEY-A']);
  });

  it('should hand out copies that cannot change stored records', async () => {
    const holder = { name: 'Test Holder', phone: '5550100200' };
    const [inserted] = await store.insertAll([{ key: 'KEY-A', createdAt: t1, holder }]);
    holder.name = 'Changed';
    inserted?.createdAt.setFullYear(2000);

    await expect(store.findByKey('KEY-A')).resolves.toEqual({
      id: 1,
      key: 'KEY-A',
      createdAt: t1,
      holder: { name: 'Test Holder', phone: '5550100200' },
    });
  });

  it('should return undefined for an unknown key', async () => {
    await expect(store.findByKey('KEY-Z')).resolves.toBeUndefined();
  });
});
