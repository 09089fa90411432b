import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { KEY_VALUE_STORE, KeyValueStore } from '../storage/key-value-store.interface';
import { CorruptStateError } from '../storage/storage.errors';
import { PersistedPositionDto } from './dto/persisted-position.dto';
import { Position, PositionInput, toPositionInput } from './entities/position.entity';

export const POSITIONS_STORAGE_KEY = 'portfolio.positions';

// Whole-list persistence for the portfolio.
// Only ticker/buyPrice/shares are written; market data is re-fetched after every load.
@Injectable()
export class PortfolioStorageService {
  constructor(@Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore) {}

  /**
   * Reads the persisted snapshot.
   * @returns null when nothing has been saved yet
   * @throws CorruptStateError when the stored value cannot be decoded
   */
  async load(): Promise<PositionInput[] | null> {
    const raw = await this.store.getItem(POSITIONS_STORAGE_KEY);
    if (raw === null) {
      return null;
    }
    return decodeSnapshot(raw);
  }

  /** Overwrites the stored snapshot with the given list, in order */
  async save(positions: Position[]): Promise<void> {
    await this.store.setItem(POSITIONS_STORAGE_KEY, encodeSnapshot(positions));
  }
}

export function encodeSnapshot(positions: Position[]): string {
  return JSON.stringify(positions.map(toPositionInput));
}

export function decodeSnapshot(raw: string): PositionInput[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorruptStateError('Persisted portfolio is not valid JSON', [reason]);
  }

  if (!Array.isArray(parsed)) {
    throw new CorruptStateError('Persisted portfolio is not a JSON array');
  }

  const problems: string[] = [];
  const positions = parsed.map((entry: unknown, index): PositionInput => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      problems.push(`[${index}] is not an object`);
      return { ticker: '', buyPrice: 0, shares: 0 };
    }

    const dto = plainToInstance(PersistedPositionDto, entry);
    for (const error of validateSync(dto)) {
      const constraints = Object.values(error.constraints ?? {});
      problems.push(`[${index}].${error.property}: ${constraints.join(', ')}`);
    }
    return { ticker: dto.ticker, buyPrice: dto.buyPrice, shares: dto.shares };
  });

  if (problems.length > 0) {
    throw new CorruptStateError('Persisted portfolio failed validation', problems);
  }
  return positions;
}
