import chalk from 'chalk';
import { CONFIGURATION_HINTS, loadConfig } from '../config';
import { ConfigurationError, toErrorMessage } from '../errors';
import { enableVerboseLogging } from '../logger';
import { SyncService } from '../services/SyncService';
import type { SupplierKey } from '../types';
import { parseSupplierOption } from '../utils/validators';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CommonOptions {
  verbose?: boolean;
}

export interface SupplierOptions extends CommonOptions {
  supplier?: string;
}

export function applyVerbosity(options: CommonOptions): void {
  if (options.verbose) {
    enableVerboseLogging();
  }
}

/**
 * Validate a --supplier value, printing the error. `false` means invalid.
 */
export function resolveSupplierOption(value: string | undefined): SupplierKey | undefined | false {
  try {
    return parseSupplierOption(value);
  } catch (error) {
    console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
    return false;
  }
}

/**
 * Build the sync service from the environment. Missing configuration is
 * reported with setup hints and yields null; nothing touches the network.
 */
export function createService(): SyncService | null {
  try {
    return SyncService.fromConfig(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red(`Configuration error: ${error.message}`));
      console.error('');
      for (const line of CONFIGURATION_HINTS) {
        console.error(chalk.gray(line));
      }
      return null;
    }
    throw error;
  }
}

export function reportError(error: unknown, verbose?: boolean): number {
  console.error(chalk.red(`\n❌ Error: ${toErrorMessage(error)}`));
  if (verbose && error instanceof Error && error.stack) {
    console.error(chalk.gray('\nTraceback:'));
    console.error(chalk.gray(error.stack));
  }
  return EXIT_FAILURE;
}
