import { mock } from 'jest-mock-extended';
import { IssuanceService, DEFAULT_MAX_BATCH_SIZE } from '../services/issuance.service';
import { KeyGeneratorService } from '../services/key-generator.service';
import { UniquenessGuard } from '../services/uniqueness-guard.service';
import { ArtifactRendererService } from '../services/artifact-renderer.service';
import { InMemoryLicenseStore } from '../stores/memory-license-store';
import { SqliteLicenseStore } from '../stores/sqlite-license-store';
import type { LicenseStore } from '../stores/license-store';
import type { ArtifactDestination } from '../artifacts/artifact.types';
import { openDatabase, closeDatabase, MEMORY_DATABASE, type DatabaseHandle } from '../../database/client';
import {
  CollisionExhaustedError,
  NotFoundError,
  PersistenceError,
  ValidationError,
} from '../../errors/base.error';
import { getCorrelationId } from '../../logging/context/correlation';

const KEY_PATTERN = /^[A-Z0-9]{5}-[A-Z0-9]{5}-[A-Z0-9]{5}-[A-Z0-9]{5}$/;

interface ServiceOptions {
  store?: LicenseStore;
  generator?: KeyGeneratorService;
  maxAttempts?: number;
  maxBatchSize?: number;
  clock?: () => Date;
}

function createService(options: ServiceOptions = {}) {
  const store = options.store ?? new InMemoryLicenseStore();
  const generator = options.generator ?? new KeyGeneratorService();
  const guard = new UniquenessGuard(generator, store, options.maxAttempts ?? 10);
  const renderer = new ArtifactRendererService({ title: 'License Certificate', issuer: 'Test Issuer' });

  const service = new IssuanceService({
    store,
    generator,
    guard,
    renderer,
    maxBatchSize: options.maxBatchSize,
    clock: options.clock,
  });

  return { service, store, generator };
}

/**
 * Generator whose key space holds exactly one key: "A"
 */
function singleKeyGenerator(): KeyGeneratorService {
  return new KeyGeneratorService({ alphabet: 'A', segments: 1, segmentLength: 1, separator: '' });
}

describe('IssuanceService', () => {
  describe('issueOne', () => {
    it('should issue the first license of an empty store with id 1', async () => {
      const issuedAt = new Date('2024-05-10T08:15:00.000Z');
      const { service } = createService({ clock: () => issuedAt });

      const record = await service.issueOne();

      expect(record.id).toBe(1);
      expect(record.key).toMatch(KEY_PATTERN);
      expect(record.createdAt).toEqual(issuedAt);
      expect(record.holder).toBeUndefined();
      await expect(service.listAll()).resolves.toEqual([record]);
    });

    it('should store a trimmed holder with the license', async () => {
      const { service } = createService();

      const record = await service.issueOne({ name: '  Test Holder ', phone: ' +1 (555) 010-0200 ' });

      expect(record.holder).toEqual({ name: 'Test Holder', phone: '+1 (555) 010-0200' });
      await expect(service.getByKey(record.key)).resolves.toEqual(record);
    });

    it('should reject an invalid holder before generating a key', async () => {
      const generator = new KeyGeneratorService();
      const generate = jest.spyOn(generator, 'generate');
      const { service, store } = createService({ generator });

      const error = await service.issueOne({ name: '   ', phone: '123' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        fields: [
          { field: 'name', message: 'Full name cannot be empty' },
          { field: 'phone', message: 'Phone number must contain 7-15 digits' },
        ],
      });
      expect(generate).not.toHaveBeenCalled();
      expect(await store.count()).toBe(0);
    });

    it('should tag errors with the correlation id of the request', async () => {
      const { service } = createService();

      const error = await service.issueOne({ name: '', phone: '' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ correlationId: expect.any(String) });
    });

    it('should never issue the same key twice over 1000 requests', async () => {
      const db = await openDatabase({ path: MEMORY_DATABASE, busyTimeout: 1000 });
      try {
        const { service, store } = createService({ store: new SqliteLicenseStore(db) });
        const keys = new Set<string>();

        for (let i = 0; i < 1000; i++) {
          const record = await service.issueOne();
          expect(record.key).toMatch(KEY_PATTERN);
          keys.add(record.key);
        }

        expect(keys.size).toBe(1000);
        expect(await store.count()).toBe(1000);
      } finally {
        closeDatabase(db);
      }
    });

    it('should keep keys unique across concurrent requests', async () => {
      const { service, store } = createService();

      const records = await Promise.all(Array.from({ length: 25 }, () => service.issueOne()));

      expect(new Set(records.map(r => r.key)).size).toBe(25);
      expect(await store.count()).toBe(25);
    });

    it('should exhaust after maxAttempts when every candidate exists, writing nothing', async () => {
      const store = mock<LicenseStore>();
      store.exists.mockResolvedValue(true);
      const { service } = createService({ store, maxAttempts: 7 });

      await expect(service.issueOne()).rejects.toBeInstanceOf(CollisionExhaustedError);
      expect(store.exists).toHaveBeenCalledTimes(7);
      expect(store.insertAll).not.toHaveBeenCalled();
    });

    it('should exhaust a single-key space on the second issuance', async () => {
      const { service, store } = createService({ generator: singleKeyGenerator() });

      await expect(service.issueOne()).resolves.toMatchObject({ id: 1, key: 'A' });
      await expect(service.issueOne()).rejects.toBeInstanceOf(CollisionExhaustedError);
      expect(await store.count()).toBe(1);
    });

    it('should surface a store conflict to the caller unchanged', async () => {
      const store = new InMemoryLicenseStore();
      const conflict = new PersistenceError('License key already exists; batch rolled back', 'duplicate_key');
      jest.spyOn(store, 'insertAll').mockRejectedValueOnce(conflict);
      const { service } = createService({ store });

      await expect(service.issueOne()).rejects.toBe(conflict);
      expect(await store.count()).toBe(0);
    });
  });

  describe('issueBatch', () => {
    it('should issue the requested number of distinct keys', async () => {
      const { service, store } = createService();
      await service.issueOne();

      const records = await service.issueBatch(50);

      expect(records).toHaveLength(50);
      expect(new Set(records.map(r => r.key)).size).toBe(50);
      records.forEach(r => expect(r.key).toMatch(KEY_PATTERN));
      expect(await store.count()).toBe(51);
    });

    it('should stamp every record of a batch with one timestamp and commit once', async () => {
      const store = new InMemoryLicenseStore();
      const insertAll = jest.spyOn(store, 'insertAll');
      const clock = jest.fn(() => new Date('2024-05-10T08:15:00.000Z'));
      const { service } = createService({ store, clock });

      const records = await service.issueBatch(5);

      expect(insertAll).toHaveBeenCalledTimes(1);
      expect(clock).toHaveBeenCalledTimes(1);
      expect(new Set(records.map(r => r.createdAt.toISOString()))).toEqual(
        new Set(['2024-05-10T08:15:00.000Z'])
      );
      expect(records.map(r => r.id)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should leave the store unchanged when the batch write fails', async () => {
      const db = await openDatabase({ path: MEMORY_DATABASE, busyTimeout: 1000 });
      try {
        const store = new SqliteLicenseStore(db);
        await store.insertAll([{ key: 'TAKEN', createdAt: new Date('2024-01-01T00:00:00.000Z') }]);

        // Another issuer wins the race for the tenth key after the pre-check
        const generator = mock<KeyGeneratorService>();
        let drawn = 0;
        generator.generate.mockImplementation(() => (++drawn === 10 ? 'TAKEN' : `FRESH-${drawn}`));
        jest.spyOn(store, 'exists').mockResolvedValue(false);
        const { service } = createService({ store, generator });

        await expect(service.issueBatch(10)).rejects.toMatchObject({ reason: 'duplicate_key' });
        expect(await store.count()).toBe(1);
        expect(await store.findByKey('FRESH-1')).toBeUndefined();
      } finally {
        closeDatabase(db);
      }
    });

    it('should abort the whole batch when the guard exhausts midway', async () => {
      const store = new InMemoryLicenseStore();
      const insertAll = jest.spyOn(store, 'insertAll');
      const { service } = createService({ store, generator: singleKeyGenerator() });

      await expect(service.issueBatch(2)).rejects.toBeInstanceOf(CollisionExhaustedError);
      expect(insertAll).not.toHaveBeenCalled();
      expect(await store.count()).toBe(0);
    });

    it.each([0, -3, 2.5, Number.NaN])('should reject a batch size of %p', async count => {
      const { service, store } = createService();

      await expect(service.issueBatch(count)).rejects.toBeInstanceOf(ValidationError);
      expect(await store.count()).toBe(0);
    });

    it('should reject batches above the configured maximum', async () => {
      const { service } = createService({ maxBatchSize: 5 });

      await expect(service.issueBatch(6)).rejects.toMatchObject({
        fields: [{ field: 'count', message: 'Batch size must be at most 5' }],
      });
      await expect(service.issueBatch(5)).resolves.toHaveLength(5);
    });

    it('should default the maximum batch size to 1000', () => {
      expect(DEFAULT_MAX_BATCH_SIZE).toBe(1000);
    });
  });

  describe('listAll', () => {
    it('should list in reverse insertion order even when the clock steps back', async () => {
      const clock = jest
        .fn<Date, []>()
        .mockReturnValueOnce(new Date('2024-05-10T08:00:00.000Z'))
        .mockReturnValueOnce(new Date('2024-05-10T09:00:00.000Z'))
        .mockReturnValueOnce(new Date('2024-05-10T07:00:00.000Z'));
      const { service } = createService({ clock });

      const first = await service.issueOne();
      const batch = await service.issueBatch(2);
      const last = await service.issueOne();

      const listed = await service.listAll();

      expect(last.createdAt).toEqual(new Date('2024-05-10T09:00:00.000Z'));
      expect(listed.map(r => r.id)).toEqual([4, 3, 2, 1]);
      expect(listed.map(r => r.key)).toEqual([last.key, batch[1]?.key, batch[0]?.key, first.key]);
    });

    it('should keep SQLite listings in reverse insertion order after a clock step back', async () => {
      const db = await openDatabase({ path: MEMORY_DATABASE, busyTimeout: 1000 });
      try {
        const clock = jest
          .fn<Date, []>()
          .mockReturnValueOnce(new Date('2024-05-10T09:00:00.000Z'))
          .mockReturnValueOnce(new Date('2024-05-10T08:59:59.000Z'));
        const { service } = createService({ store: new SqliteLicenseStore(db), clock });

        await service.issueOne();
        await service.issueOne();

        expect((await service.listAll()).map(r => r.id)).toEqual([2, 1]);
      } finally {
        closeDatabase(db);
      }
    });
  });

  describe('getByKey', () => {
    it('should raise NotFoundError with a masked key', async () => {
      const { service } = createService();

      await expect(service.getByKey('AB12C-3DE45-FG678-HI9J0')).rejects.toThrow(
        new NotFoundError('License', 'AB12C-*****-*****-HI9J0')
      );
    });
  });

  describe('render and export', () => {
    it('should render the same record to identical bytes every time', async () => {
      const { service } = createService();
      const record = await service.issueOne();

      const first = await service.render(record);
      const second = await service.render(record);

      expect(first.key).toBe(record.key);
      expect(first.document.equals(second.document)).toBe(true);
      expect(first.qrCode.equals(second.qrCode)).toBe(true);
    });

    it('should hand the artifact to the destination passed in', async () => {
      const { service } = createService();
      const record = await service.issueOne();
      const destination: ArtifactDestination = { write: jest.fn().mockResolvedValue('memory://artifact') };

      await expect(service.exportArtifact(record, destination)).resolves.toBe('memory://artifact');
      expect(destination.write).toHaveBeenCalledWith(
        expect.objectContaining({
          key: record.key,
          fileName: `license-${record.key}.svg`,
          mimeType: 'image/svg+xml',
        })
      );
    });
  });

  describe('correlation', () => {
    it('should run the store write inside the request correlation context', async () => {
      const store = new InMemoryLicenseStore();
      const seen: Array<string | undefined> = [];
      const insertAll = store.insertAll.bind(store);
      jest.spyOn(store, 'insertAll').mockImplementation(records => {
        seen.push(getCorrelationId());
        return insertAll(records);
      });
      const { service } = createService({ store });

      await service.issueOne();

      expect(seen).toHaveLength(1);
      expect(seen[0]).toEqual(expect.any(String));
    });
  });
});
