/*
 * MIT License
 * Copyright (c) 2024
 */

import { createApplication } from './app';
import { toError } from './lifecycle/errors';

const main = async () => {
  const app = createApplication();

  try {
    const outcome = await app.run();

    if (outcome.status === 'failed') {
      app.logger.error('Shutdown did not complete cleanly', { error: outcome.error.message });
    }

    process.exit(outcome.exitCode);
  } catch (error) {
    app.logger.error('Failed to run application', { error: toError(error).message });
    process.exit(1);
  }
};

void main();
