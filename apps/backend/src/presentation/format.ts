const usdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `1234.5` → `$1,234.50` */
export function formatUsd(value: number): string {
  return usdFormatter.format(value);
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/** Display name of an asset id: `bitcoin` → `Bitcoin`. */
export function assetLabel(asset: string): string {
  return asset.charAt(0).toUpperCase() + asset.slice(1);
}
