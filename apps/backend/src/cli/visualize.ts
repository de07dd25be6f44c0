import 'reflect-metadata';
import { renderSummaryTable } from '../presentation/console-report';
import { VisualizerService } from '../presentation/visualizer.service';
import { DEFAULT_LOOKBACK_HOURS } from '../prices/dto/price-query.dto';
import { positiveIntArg } from './args';
import { createCliContext, runCli } from './cli';

// usage: visualize [hours]
runCli('Visualizer', async () => {
  const hours = positiveIntArg(process.argv[2], 'hours', DEFAULT_LOOKBACK_HOURS);
  const app = await createCliContext();

  try {
    console.log('Generating cryptocurrency visualizations...');
    const report = await app.get(VisualizerService).generate(hours);

    for (const file of report.files) {
      console.log(`✓ Generated ${file}`);
    }
    console.log(`\nSummary Statistics (Last ${hours} Hours):`);
    console.log(renderSummaryTable(report.summaries));
  } finally {
    await app.close();
  }
});
