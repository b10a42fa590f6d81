import chalk from 'chalk';
import { describeConfig, loadConfig } from '../config';
import { toErrorMessage } from '../errors';
import { EXIT_FAILURE, EXIT_OK } from './common';

export async function configCommand(): Promise<number> {
  try {
    const config = loadConfig();
    console.log('Configuration Status:\n');
    for (const line of describeConfig(config)) {
      console.log(line);
    }
    return EXIT_OK;
  } catch (error) {
    console.error(chalk.red(`Error loading configuration: ${toErrorMessage(error)}`));
    return EXIT_FAILURE;
  }
}
