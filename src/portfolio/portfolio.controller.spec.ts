import { ArgumentMetadata, BadRequestException, ValidationPipe } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { QuoteSnapshot } from '../quote/interfaces/quote-snapshot.interface';
import { QuoteService } from '../quote/quote.service';
import { InMemoryKeyValueStore } from '../storage/in-memory-key-value.store';
import { KEY_VALUE_STORE } from '../storage/key-value-store.interface';
import { CreatePositionDto } from './dto/create-position.dto';
import { DeletePositionResponseDto } from './dto/delete-position-response.dto';
import { PortfolioController } from './portfolio.controller';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStorageService } from './portfolio-storage.service';
import { PositionIndexOutOfRangeException } from './portfolio.errors';
import { PortfolioService } from './portfolio.service';

describe('PortfolioController', () => {
  let controller: PortfolioController;
  let fetchQuote: jest.Mock<Promise<QuoteSnapshot | null>, [string]>;

  const createDto = (overrides: Partial<CreatePositionDto> = {}): CreatePositionDto => ({
    ticker: 'AAPL',
    buyPrice: 100,
    shares: 10,
    ...overrides,
  });

  beforeEach(async () => {
    fetchQuote = jest
      .fn<Promise<QuoteSnapshot | null>, [string]>()
      .mockResolvedValue({ currentPrice: 110, prevClose: 105 });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [PortfolioController],
      providers: [
        PortfolioService,
        PortfolioQueryService,
        PortfolioStorageService,
        { provide: KEY_VALUE_STORE, useValue: new InMemoryKeyValueStore() },
        { provide: QuoteService, useValue: { fetch: fetchQuote } },
      ],
    }).compile();

    controller = module.get<PortfolioController>(PortfolioController);
  });

  describe('addPosition', () => {
    it('should create a position and return it with metrics', async () => {
      const result = await controller.addPosition(createDto());

      expect(result.index).toBe(0);
      expect(result.ticker).toBe('AAPL');
      expect(result.currentPrice).toBe(110);
      expect(result.totalGain).toBe(100);
      expect(result.dayGainPercent).toBe(4.76);
    });
  });

  describe('getPositions', () => {
    it('should list positions in insertion order', async () => {
      await controller.addPosition(createDto({ ticker: 'MSFT' }));
      await controller.addPosition(createDto({ ticker: 'AAPL' }));

      expect(controller.getPositions().map((p) => p.ticker)).toEqual(['MSFT', 'AAPL']);
    });
  });

  describe('getPosition', () => {
    it('should throw 404 for a missing index', () => {
      expect(() => controller.getPosition(3)).toThrow(PositionIndexOutOfRangeException);
    });
  });

  describe('editPosition', () => {
    it('should replace the position at index', async () => {
      await controller.addPosition(createDto());

      const result = await controller.editPosition(0, createDto({ ticker: 'MSFT', shares: 1 }));

      expect(result.ticker).toBe('MSFT');
      expect(result.shares).toBe(1);
      expect(result.costBasis).toBe(100);
    });

    it('should reject an out-of-range index', async () => {
      await expect(controller.editPosition(5, createDto())).rejects.toBeInstanceOf(PositionIndexOutOfRangeException);
    });
  });

  describe('deletePosition', () => {
    it('should remove the position and report what is left', async () => {
      await controller.addPosition(createDto({ ticker: 'MSFT' }));
      await controller.addPosition(createDto({ ticker: 'AAPL' }));

      const result: DeletePositionResponseDto = await controller.deletePosition(0);

      expect(result).toEqual({ message: 'Position 0 (MSFT) deleted', ticker: 'MSFT', remaining: 1 });
      expect(controller.getPositions().map((p) => p.ticker)).toEqual(['AAPL']);
    });
  });

  describe('refresh', () => {
    it('should refresh every position and return the summary', async () => {
      await controller.addPosition(createDto());
      fetchQuote.mockResolvedValue({ currentPrice: 120, prevClose: 110 });

      const summary = await controller.refresh();

      expect(summary.totalValue).toBe(1200);
      expect(summary.totalGain).toBe(200);
      expect(summary.dayGain).toBe(100);
    });
  });

  describe('getSummary', () => {
    it('should return portfolio totals', async () => {
      await controller.addPosition(createDto());

      const summary = controller.getSummary();

      expect(summary.positionCount).toBe(1);
      expect(summary.totalCost).toBe(1000);
      expect(summary.totalGainPercent).toBe(10);
    });
  });

  describe('request validation', () => {
    const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true });
    const metadata: ArgumentMetadata = { type: 'body', metatype: CreatePositionDto };

    it('should normalise a valid body', async () => {
      const dto = await pipe.transform({ ticker: ' msft ', buyPrice: 310.5, shares: 3 }, metadata);

      expect(dto).toBeInstanceOf(CreatePositionDto);
      expect(dto).toMatchObject({ ticker: 'MSFT', buyPrice: 310.5, shares: 3 });
    });

    it.each([
      ['an empty ticker', { ticker: '  ', buyPrice: 1, shares: 1 }],
      ['a non-numeric price', { ticker: 'AAPL', buyPrice: 'abc', shares: 1 }],
      ['a negative price', { ticker: 'AAPL', buyPrice: -5, shares: 1 }],
      ['fractional shares', { ticker: 'AAPL', buyPrice: 1, shares: 2.5 }],
      ['zero shares', { ticker: 'AAPL', buyPrice: 1, shares: 0 }],
      ['unknown fields', { ticker: 'AAPL', buyPrice: 1, shares: 1, currentPrice: 5 }],
    ])('should reject %s', async (_label, body) => {
      await expect(pipe.transform(body, metadata)).rejects.toBeInstanceOf(BadRequestException);
    });
  });
});
