// מייבא ומריץ את envLoader לפני כל מודול שקורא משתני סביבה
import './envLoader';

import { createModuleLogger } from 'cds-core';
import { startServer } from './app';

const logger = createModuleLogger('MainIndex');

logger.info('Application starting...');

startServer()
  .then(({ stop }) => {
    process.on('SIGINT', () => {
      logger.info('SIGINT received. Attempting graceful shutdown...');
      stop()
        .then(() => {
          logger.info('HTTP server closed.');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error while closing the HTTP server:', error);
          process.exit(1);
        });
    });
  })
  .catch((error: unknown) => {
    logger.error('Error during application startup:', error);
    process.exit(1);
  });

process.on('uncaughtException', (error) => {
  logger.error('CRITICAL: Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('CRITICAL: Unhandled Rejection, reason:', reason);
  process.exit(1);
});
