import { INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { TrackerService } from '../tracker/tracker.service';
import { positiveIntArg } from './args';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Polls until SIGINT or SIGTERM, then closes `app`, which releases the
 * SQLite connection. The context is closed on failure too.
 */
export async function runTracker(
  app: INestApplicationContext,
  intervalArg?: string,
): Promise<void> {
  const logger = new Logger('Tracker');
  const tracker = app.get(TrackerService);
  const stop = (): void => {
    tracker.stop().catch((error: unknown) => {
      logger.error(error instanceof Error ? error.message : String(error));
    });
  };

  try {
    const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
    const interval = positiveIntArg(
      intervalArg,
      'interval',
      config.get('POLL_INTERVAL_SECONDS', { infer: true }),
    );

    for (const signal of SHUTDOWN_SIGNALS) {
      process.once(signal, stop);
    }
    await tracker.run(interval);
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, stop);
    }
    await app.close();
  }
}
