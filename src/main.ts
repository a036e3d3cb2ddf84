import { cancelOnSignals, defaultDependencies, main } from './cli';
import { EXIT_INVALID } from './core/exitCodes';
import { logger } from './core/logger';

const controller = new AbortController();
cancelOnSignals(controller);

main(process.argv, { ...defaultDependencies(), signal: controller.signal })
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Unexpected failure');
    process.exitCode = EXIT_INVALID;
  });
