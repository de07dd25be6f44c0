import {
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  renderCurrentPrices,
  renderLatestStored,
} from '../presentation/console-report';
import { NewPriceSample, PriceSample } from '../prices/price-sample.entity';
import { PriceStoreService } from '../prices/price-store.service';
import { formatTimestamp } from '../prices/timestamps';
import { PriceQuote } from './dto/simple-price-quote.dto';
import { PriceFeedService } from './price-feed.service';

export const TRACKER_TIMEOUT = 'price-tracker';

/**
 * Drives the fetch → persist → display loop. Iterations never overlap: the
 * next one is scheduled only after the previous one has finished.
 */
@Injectable()
export class TrackerService implements OnApplicationShutdown {
  private readonly logger = new Logger(TrackerService.name);

  private stopRun: (() => void) | null = null;
  private inFlight: Promise<void> = Promise.resolve();

  constructor(
    private readonly priceFeed: PriceFeedService,
    private readonly priceStore: PriceStoreService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  /** Stores one sample per fetched quote, all with the same timestamp. */
  async persist(
    quotes: readonly PriceQuote[] | null,
    at: Date = new Date(),
  ): Promise<PriceSample[]> {
    if (!quotes || quotes.length === 0) {
      return [];
    }
    const timestamp = formatTimestamp(at);
    const samples: NewPriceSample[] = quotes.map((quote) => ({
      asset: quote.asset,
      priceUsd: quote.priceUsd,
      marketCapUsd: quote.marketCapUsd,
      volumeUsd: quote.volumeUsd,
      timestamp,
    }));
    return this.priceStore.insertMany(samples);
  }

  /**
   * One iteration of the loop. A failed or empty fetch skips the cycle;
   * storage errors are rethrown.
   */
  async tick(): Promise<void> {
    const quotes = await this.priceFeed.fetchQuotes();
    if (!quotes || quotes.length === 0) {
      return;
    }
    const now = new Date();
    await this.persist(quotes, now);

    console.log(`\n${renderCurrentPrices(quotes, now)}`);
    console.log(`\n${renderLatestStored(await this.priceStore.latestPerAsset())}`);
  }

  /**
   * Polls every `intervalSeconds` until {@link stop} is called. Rejects with
   * the first storage error.
   */
  run(intervalSeconds: number): Promise<void> {
    if (this.stopRun) {
      return Promise.reject(new Error('Tracker is already running'));
    }
    this.logger.log(
      `Starting price tracker, polling every ${intervalSeconds}s`,
    );

    return new Promise<void>((resolve, reject) => {
      this.stopRun = resolve;

      const iterate = (): void => {
        const iteration = this.tick();
        this.inFlight = iteration.catch(() => undefined);

        iteration.then(
          () => {
            if (!this.stopRun) {
              return;
            }
            const timeout = setTimeout(() => {
              this.schedulerRegistry.deleteTimeout(TRACKER_TIMEOUT);
              iterate();
            }, intervalSeconds * 1000);
            this.schedulerRegistry.addTimeout(TRACKER_TIMEOUT, timeout);
          },
          (error: unknown) => {
            this.logger.error(
              `Tracker stopped by storage error: ${
                error instanceof Error ? error.message : String(error)
              }`,
            );
            this.stopRun = null;
            reject(error);
          },
        );
      };

      iterate();
    });
  }

  /** Cancels the pending iteration after the one in flight has finished. */
  async stop(): Promise<void> {
    const resolveRun = this.stopRun;
    if (!resolveRun) {
      return;
    }
    this.stopRun = null;
    await this.inFlight;

    if (this.schedulerRegistry.doesExist('timeout', TRACKER_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(TRACKER_TIMEOUT);
    }
    this.logger.log('Stopping price tracker...');
    resolveRun();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }
}
