import { loadOrCreateRegistration, RegistrationError } from './appservice/registration.js';
import { createServices, startApp, stopServices } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { createLogger, errorMeta, type Logger } from './utils/logger.js';
import {
  formatStartupIssue,
  StartupValidationError,
  throwOnStartupErrors,
  validateRegistration,
  validateStartupConfig,
  type StartupIssue,
} from './utils/startup.js';

const reportIssues = (logger: Logger, issues: StartupIssue[]) => {
  for (const issue of issues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }
};

const checked = (logger: Logger, issues: StartupIssue[]) => {
  reportIssues(logger, issues);
  return throwOnStartupErrors(issues);
};

const run = async (config: AppConfig, logger: Logger) => {
  checked(logger, validateStartupConfig(config));

  const { registration, created } = await loadOrCreateRegistration(
    config.APPSERVICE_REGISTRATION,
    {
      id: config.APPSERVICE_ID,
      senderLocalpart: config.APPSERVICE_SENDER_LOCALPART,
      url: config.APPSERVICE_URL,
    },
    logger.child('registration'),
  );
  if (created) {
    logger.info('add the new registration file to the homeserver configuration and restart it');
  }
  checked(logger, validateRegistration(registration));

  const services = createServices(config, registration, logger);
  const server = await startApp(config, services, logger);
  logger.info(`appservice ${registration.id} started as ${services.userId}`);

  const shutdown = async () => {
    logger.info('shutdown signal received');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    await stopServices(services, logger);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('shutdown failed', errorMeta(error));
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

const main = () => {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const logger = createLogger('matrix-free-stuff');
    logger.error(error instanceof ConfigError ? error.message : 'failed to load configuration', errorMeta(error));
    process.exit(1);
  }

  const logger = createLogger('matrix-free-stuff', config.LOG_LEVEL);
  run(config, logger).catch((error: unknown) => {
    if (error instanceof StartupValidationError) {
      logger.error(`startup checks failed, aborting (${error.errorCount} error(s))`);
    } else if (error instanceof RegistrationError) {
      logger.error(`${error.message} (${error.filePath})`, errorMeta(error.cause));
    } else {
      logger.error('fatal', errorMeta(error));
    }
    process.exit(1);
  });
};

main();
