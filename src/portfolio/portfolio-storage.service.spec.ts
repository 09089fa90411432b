import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryKeyValueStore } from '../storage/in-memory-key-value.store';
import { KEY_VALUE_STORE } from '../storage/key-value-store.interface';
import { CorruptStateError } from '../storage/storage.errors';
import { createPosition } from './entities/position.entity';
import { POSITIONS_STORAGE_KEY, PortfolioStorageService } from './portfolio-storage.service';

describe('PortfolioStorageService', () => {
  let storage: PortfolioStorageService;
  let kv: InMemoryKeyValueStore;

  beforeEach(async () => {
    kv = new InMemoryKeyValueStore();
    const module: TestingModule = await Test.createTestingModule({
      providers: [PortfolioStorageService, { provide: KEY_VALUE_STORE, useValue: kv }],
    }).compile();

    storage = module.get<PortfolioStorageService>(PortfolioStorageService);
  });

  describe('load', () => {
    it('should return null when nothing was saved', async () => {
      expect(await storage.load()).toBeNull();
    });

    it('should return an empty list for an empty snapshot', async () => {
      await kv.setItem(POSITIONS_STORAGE_KEY, '[]');
      expect(await storage.load()).toEqual([]);
    });

    it('should accept the older snapshot format with prevClose', async () => {
      await kv.setItem(
        POSITIONS_STORAGE_KEY,
        JSON.stringify([
          { ticker: 'AAPL', buyPrice: 100, shares: 10, prevClose: 105 },
          { ticker: 'MSFT', buyPrice: 300, shares: 2, prevClose: null },
        ]),
      );

      expect(await storage.load()).toEqual([
        { ticker: 'AAPL', buyPrice: 100, shares: 10 },
        { ticker: 'MSFT', buyPrice: 300, shares: 2 },
      ]);
    });

    it('should reject invalid JSON', async () => {
      await kv.setItem(POSITIONS_STORAGE_KEY, '[{"ticker":');
      await expect(storage.load()).rejects.toBeInstanceOf(CorruptStateError);
    });

    it('should reject a snapshot that is not an array', async () => {
      await kv.setItem(POSITIONS_STORAGE_KEY, '{"ticker":"AAPL"}');
      await expect(storage.load()).rejects.toThrow('Persisted portfolio is not a JSON array');
    });

    it('should list every invalid field', async () => {
      await kv.setItem(
        POSITIONS_STORAGE_KEY,
        JSON.stringify([
          { ticker: 'AAPL', buyPrice: 100, shares: 10 },
          { ticker: '', buyPrice: -1, shares: 1.5 },
          'MSFT',
        ]),
      );

      const caught = await storage.load().catch((error: unknown) => error);

      expect(caught).toBeInstanceOf(CorruptStateError);
      const details = caught instanceof CorruptStateError ? caught.details : [];
      expect(details).toHaveLength(4);
      expect(details.some((d) => d.startsWith('[1].ticker:'))).toBe(true);
      expect(details.some((d) => d.startsWith('[1].buyPrice:'))).toBe(true);
      expect(details.some((d) => d.startsWith('[1].shares:'))).toBe(true);
      expect(details).toContain('[2] is not an object');
    });

    it('should reject string-typed numbers', async () => {
      await kv.setItem(POSITIONS_STORAGE_KEY, JSON.stringify([{ ticker: 'AAPL', buyPrice: '100', shares: 10 }]));
      await expect(storage.load()).rejects.toThrow(/\[0\]\.buyPrice/);
    });
  });

  describe('save', () => {
    it('should write only ticker, buyPrice and shares', async () => {
      const position = createPosition({ ticker: 'AAPL', buyPrice: 100, shares: 10 });
      position.currentPrice = 110;
      position.prevClose = 105;
      position.high52w = 150;

      await storage.save([position]);

      expect(await kv.getItem(POSITIONS_STORAGE_KEY)).toBe('[{"ticker":"AAPL","buyPrice":100,"shares":10}]');
    });

    it('should round-trip triples in order', async () => {
      const positions = [
        createPosition({ ticker: 'MSFT', buyPrice: 310.25, shares: 3 }),
        createPosition({ ticker: 'AAPL', buyPrice: 100, shares: 10 }),
        createPosition({ ticker: 'AAPL', buyPrice: 0, shares: 1 }),
      ];

      await storage.save(positions);

      expect(await storage.load()).toEqual([
        { ticker: 'MSFT', buyPrice: 310.25, shares: 3 },
        { ticker: 'AAPL', buyPrice: 100, shares: 10 },
        { ticker: 'AAPL', buyPrice: 0, shares: 1 },
      ]);
    });

    it('should replace the previous snapshot', async () => {
      await storage.save([createPosition({ ticker: 'AAPL', buyPrice: 100, shares: 10 })]);
      await storage.save([]);

      expect(await storage.load()).toEqual([]);
    });
  });
});
