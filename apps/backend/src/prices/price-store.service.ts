import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { NewPriceSample, PriceSample } from './price-sample.entity';
import { formatTimestamp } from './timestamps';

/**
 * Append-only log of price samples. Nothing here updates or deletes rows,
 * and there is no retention policy: the table only grows.
 */
@Injectable()
export class PriceStoreService implements OnModuleInit {
  private readonly logger = new Logger(PriceStoreService.name);

  constructor(
    @InjectRepository(PriceSample)
    private readonly priceRepository: Repository<PriceSample>,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  async initialize(): Promise<void> {
    await this.priceRepository.query(`
      CREATE TABLE IF NOT EXISTS "price_samples" (
        "id" INTEGER PRIMARY KEY AUTOINCREMENT,
        "asset" TEXT NOT NULL,
        "price_usd" REAL NOT NULL,
        "market_cap_usd" REAL NOT NULL,
        "volume_usd" REAL NOT NULL,
        "timestamp" TEXT NOT NULL
      )
    `);
    await this.priceRepository.query(`
      CREATE INDEX IF NOT EXISTS "IDX_price_samples_asset_timestamp"
      ON "price_samples" ("asset", "timestamp")
    `);
    this.logger.log('Price table ready');
  }

  async insert(sample: NewPriceSample): Promise<PriceSample> {
    return this.priceRepository.save(this.priceRepository.create(sample));
  }

  /** Appends one poll's samples; `save` wraps the batch in one transaction. */
  async insertMany(samples: NewPriceSample[]): Promise<PriceSample[]> {
    if (samples.length === 0) {
      return [];
    }
    return this.priceRepository.save(this.priceRepository.create(samples));
  }

  /**
   * Newest sample of every asset that has one. When two samples of an asset
   * share the newest timestamp, the one inserted last (highest id) wins.
   */
  async latestPerAsset(): Promise<PriceSample[]> {
    return this.priceRepository
      .createQueryBuilder('sample')
      .where((qb) => {
        const newestId = qb
          .subQuery()
          .select('latest.id')
          .from(PriceSample, 'latest')
          .where('latest.asset = sample.asset')
          .orderBy('latest.timestamp', 'DESC')
          .addOrderBy('latest.id', 'DESC')
          .limit(1)
          .getQuery();
        return `sample.id = ${newestId}`;
      })
      .orderBy('sample.asset', 'ASC')
      .getMany();
  }

  /** Every sample taken at or after `since`, oldest first, all assets mixed. */
  async rangeQuery(since: Date | string): Promise<PriceSample[]> {
    const threshold = typeof since === 'string' ? since : formatTimestamp(since);

    return this.priceRepository.find({
      where: { timestamp: MoreThanOrEqual(threshold) },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  async count(): Promise<number> {
    return this.priceRepository.count();
  }
}
