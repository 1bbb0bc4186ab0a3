import { config } from '../../config/config';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { ApiClient } from '../ApiClient';

export type ApiOptions = {
  url?: string;
  token?: string;
};

export function createApiClient(options: ApiOptions): ApiClient {
  return new ApiClient(options.url ?? config.cli.url, options.token ?? config.cli.token);
}

/** Runs a command body, printing the failure and exiting non-zero on error. */
export function runAction(what: string, action: () => Promise<void>): void {
  action().catch((error: unknown) => {
    console.error(`Failed to ${what}: ${describeError(error)}`);
    logger.error(`Failed to ${what}`, { error: describeError(error) });
    process.exit(1);
  });
}
