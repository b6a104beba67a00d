/**
 * Component: Service Entry Point
 * Documentation: documentation/operations.md
 */

import { getConfigService } from './lib/services/config.service';
import { SchedulerService } from './lib/services/scheduler.service';
import { AppLogger, describeError } from './lib/utils/logger';

const logger = AppLogger.create('Main');

async function createScheduler(): Promise<SchedulerService | null> {
  const configService = getConfigService();
  try {
    const config = await configService.load();
    return new SchedulerService(config, { configService });
  } catch (error) {
    logger.error(`Unable to start: ${describeError(error)}`);
    return null;
  }
}

async function main(): Promise<number> {
  const scheduler = await createScheduler();
  if (!scheduler) {
    return 1;
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`);
    scheduler.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await scheduler.run();
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
  });
