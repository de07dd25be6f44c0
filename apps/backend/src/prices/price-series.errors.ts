export class PriceSeriesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A statistic was requested over a window holding no samples. */
export class EmptySeriesError extends PriceSeriesError {
  constructor(asset?: string) {
    super(
      asset
        ? `No samples for ${asset} in the requested window`
        : 'No samples in the requested window',
    );
  }
}

/** The first price of a window is zero, so a relative change is undefined. */
export class ZeroBasePriceError extends PriceSeriesError {
  constructor(readonly asset: string) {
    super(`First price of ${asset} in the window is 0`);
  }
}
