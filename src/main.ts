/**
 * Lab asset intake server entry point.
 *
 * Environment: PORT (default 5000), LAB_INTAKE_CONFIG (config file path,
 * default ./config.json), LOG_LEVEL (debug, info, warn, error).
 */

import { bootstrap, createApp } from './server';
import { logger, parseLogLevel, setLogLevel } from './logger';

const PORT = parseInt(process.env.PORT ?? '5000', 10);

const level = parseLogLevel(process.env.LOG_LEVEL);
if (level) setLogLevel(level);

bootstrap()
  .then((context) => {
    const app = createApp(context);
    app.listen(PORT, () => {
      logger.info('Server listening', { port: PORT, configVersion: context.config.version });
    });
  })
  .catch((err: unknown) => {
    logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
