import 'reflect-metadata';
import { createCliContext, runCli } from './cli';
import { runTracker } from './tracker-runner';

// usage: track [intervalSeconds]
runCli('Tracker', async () => {
  const app = await createCliContext(['log', 'warn', 'error']);

  console.log('Starting cryptocurrency price tracker...');
  console.log('Press Ctrl+C to stop');
  await runTracker(app, process.argv[2]);
});
