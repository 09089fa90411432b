import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { SerialQueue } from '../common/utils/serial-queue';
import { QuoteService } from '../quote/quote.service';
import { CorruptStateError } from '../storage/storage.errors';
import { Position, PositionInput, applyQuote, createPosition } from './entities/position.entity';
import { PortfolioStorageService } from './portfolio-storage.service';
import { InvalidPositionException, PositionIndexOutOfRangeException } from './portfolio.errors';

export type PortfolioChangeKind = 'loaded' | 'added' | 'edited' | 'deleted' | 'refreshed';

export interface PortfolioChange {
  kind: PortfolioChangeKind;
  index?: number;             // affected position for added/edited/deleted
  positions: Position[];      // list after the change
}

/**
 * Owns the ordered position list.
 *
 * Every operation runs through a single-writer queue, so an add/edit/delete
 * never observes a list another operation is halfway through changing.
 * Mutations persist the new list before committing it in memory; a failed
 * write leaves the list as it was. Each completed operation emits exactly
 * one PortfolioChange.
 *
 * Quote fetches are sequential: refreshAll takes the sum of the individual
 * fetch latencies.
 */
@Injectable()
export class PortfolioService implements OnModuleDestroy {
  private readonly logger = new Logger(PortfolioService.name);
  private readonly queue = new SerialQueue();
  private readonly changes = new Subject<PortfolioChange>();

  private positions: Position[] = [];
  private fetchesInFlight = 0;
  private loaded = false;

  readonly changes$: Observable<PortfolioChange> = this.changes.asObservable();

  constructor(
    private readonly storage: PortfolioStorageService,
    private readonly quoteService: QuoteService,
  ) {}

  /** True while a quote fetch started by any operation is outstanding */
  get loading(): boolean {
    return this.fetchesInFlight > 0;
  }

  /** True once load() has completed, including its refresh pass */
  get ready(): boolean {
    return this.loaded;
  }

  /**
   * Restores the persisted list and refreshes quotes for every position.
   * Missing state yields an empty portfolio; corrupt state is logged and
   * also yields an empty portfolio (the stored value is left as is).
   */
  load(): Promise<void> {
    return this.queue.run(async () => {
      this.positions = await this.restore();
      await this.refreshPositions(this.positions);
      this.loaded = true;
      this.logger.log(`Loaded ${this.positions.length} position(s)`);
      this.emit('loaded');
    });
  }

  /** Persists the current list as is */
  save(): Promise<void> {
    return this.queue.run(() => this.storage.save(this.positions));
  }

  /**
   * Appends a position, persists, then fetches its quote.
   * Resolves after the fetch settles, with the new position's index.
   */
  add(input: PositionInput): Promise<number> {
    return this.queue.run(async () => {
      const position = createPosition(input);
      await this.commit([...this.positions, position]);

      const index = this.positions.length - 1;
      await this.refreshPositions([position]);
      this.emit('added', index);
      return index;
    });
  }

  /**
   * Replaces the position at index and re-fetches its quote.
   * The replacement starts without market data.
   * @throws PositionIndexOutOfRangeException
   */
  edit(index: number, input: PositionInput): Promise<Position> {
    return this.queue.run(async () => {
      this.assertIndex(index);
      const position = createPosition(input);
      const next = [...this.positions];
      next[index] = position;
      await this.commit(next);

      await this.refreshPositions([position]);
      this.emit('edited', index);
      return { ...position };
    });
  }

  /**
   * Removes the position at index and persists.
   * @throws PositionIndexOutOfRangeException
   */
  delete(index: number): Promise<Position> {
    return this.queue.run(async () => {
      this.assertIndex(index);
      const removed = this.positions[index];
      await this.commit(this.positions.filter((_, i) => i !== index));

      this.emit('deleted', index);
      return { ...removed };
    });
  }

  /** Fetches quotes for every position in list order, one at a time */
  refreshAll(): Promise<void> {
    return this.queue.run(async () => {
      await this.refreshPositions(this.positions);
      this.emit('refreshed');
    });
  }

  /** Copies, in list order */
  getPositions(): Position[] {
    return this.positions.map((position) => ({ ...position }));
  }

  /** @throws PositionIndexOutOfRangeException */
  getPosition(index: number): Position {
    this.assertIndex(index);
    return { ...this.positions[index] };
  }

  get count(): number {
    return this.positions.length;
  }

  /** Resolves once every operation queued so far has settled */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  async onModuleDestroy(): Promise<void> {
    await this.whenIdle();
    this.changes.complete();
  }

  private async restore(): Promise<Position[]> {
    try {
      const inputs = await this.storage.load();
      return (inputs ?? []).map(createPosition);
    } catch (error) {
      if (error instanceof CorruptStateError || error instanceof InvalidPositionException) {
        this.logger.error(`Ignoring corrupt portfolio state: ${error.message}`);
        return [];
      }
      throw error;
    }
  }

  private async commit(next: Position[]): Promise<void> {
    await this.storage.save(next);
    this.positions = next;
  }

  // Successful snapshots overwrite the position's market fields in place;
  // a failed fetch leaves whatever the position already had.
  private async refreshPositions(targets: Position[]): Promise<void> {
    if (targets.length === 0) {
      return;
    }

    this.fetchesInFlight++;
    try {
      for (const position of targets) {
        const snapshot = await this.quoteService.fetch(position.ticker);
        if (snapshot) {
          applyQuote(position, snapshot);
        } else {
          this.logger.warn(`No quote for ${position.ticker}; keeping previous market data`);
        }
      }
    } finally {
      this.fetchesInFlight--;
    }
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.positions.length) {
      throw new PositionIndexOutOfRangeException(index, this.positions.length);
    }
  }

  private emit(kind: PortfolioChangeKind, index?: number): void {
    this.changes.next({ kind, index, positions: this.getPositions() });
  }
}
