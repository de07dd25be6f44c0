import 'reflect-metadata';
import { renderHistory } from '../presentation/console-report';
import { DEFAULT_LOOKBACK_HOURS } from '../prices/dto/price-query.dto';
import { groupByAsset } from '../prices/price-stats';
import { PricesService } from '../prices/prices.service';
import { positiveIntArg } from './args';
import { createCliContext, runCli } from './cli';

// usage: query [hours]
runCli('Query', async () => {
  const hours = positiveIntArg(process.argv[2], 'hours', DEFAULT_LOOKBACK_HOURS);
  const app = await createCliContext();

  try {
    const pricesService = app.get(PricesService);
    const groups = groupByAsset(await pricesService.findHistory(hours));

    for (const asset of pricesService.trackedAssets) {
      console.log(`\n${renderHistory(asset, hours, groups.get(asset) ?? [])}`);
    }
  } finally {
    await app.close();
  }
});
