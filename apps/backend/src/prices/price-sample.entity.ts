import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One observation of an asset's price, market cap and 24h volume.
 * Rows are append-only; `timestamp` is the local capture time formatted as
 * `YYYY-MM-DD HH:MM:SS`, so string order is chronological order.
 */
@Entity('price_samples')
@Index('IDX_price_samples_asset_timestamp', ['asset', 'timestamp'])
export class PriceSample {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  asset!: string;

  @Column({ name: 'price_usd', type: 'real' })
  priceUsd!: number;

  @Column({ name: 'market_cap_usd', type: 'real' })
  marketCapUsd!: number;

  @Column({ name: 'volume_usd', type: 'real' })
  volumeUsd!: number;

  @Column({ type: 'text' })
  timestamp!: string;
}

/** Values needed to append a sample; the id is assigned by the store. */
export type NewPriceSample = Omit<PriceSample, 'id'>;
