#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { addCommand } from './commands/add';
import { bomCommand } from './commands/bom';
import { configCommand } from './commands/config';
import { syncCommand } from './commands/sync';
import { reportError } from './commands/common';

dotenv.config();

const program = new Command();

program
  .name('partsync')
  .description('Sync supplier part information to InvenTree')
  .version('1.0.0');

program
  .command('config')
  .description('Show current configuration status')
  .action(async () => {
    process.exitCode = await configCommand();
  });

program
  .command('add <partNumber>')
  .description('Add a part to InvenTree by manufacturer or supplier part number')
  .option('-s, --supplier <supplier>', 'Specific supplier to use (digikey|mouser); default tries all configured')
  .option('-v, --verbose', 'Show detailed output', false)
  .addHelpText(
    'after',
    '\nExamples:\n  partsync add 296-6501-1-ND\n  partsync add CRCW080510K0FKEA --supplier digikey\n  partsync add STM32F103C8T6 --verbose'
  )
  .action(async (partNumber: string, options: { supplier?: string; verbose?: boolean }) => {
    process.exitCode = await addCommand(partNumber, options);
  });

program
  .command('bom <assemblyNumber> <file>')
  .description('Create an assembly part and add BOM items from a TSV or CSV file')
  .option('-v, --verbose', 'Show detailed output', false)
  .addHelpText(
    'after',
    '\nColumns: Supplier, SPN (or SKU), MPN, Qty, Designators. Lines without MPN or SPN are skipped.\n\nExamples:\n  partsync bom MY-ASSEMBLY-001 total_bom.tsv\n  partsync bom MY-PCB-REV2 bom.csv --verbose'
  )
  .action(async (assemblyNumber: string, file: string, options: { verbose?: boolean }) => {
    process.exitCode = await bomCommand(assemblyNumber, file, options);
  });

program
  .command('sync')
  .description('Re-check every supplier part in InvenTree against the supplier APIs')
  .option('-s, --supplier <supplier>', 'Specific supplier to sync (digikey|mouser); default all configured')
  .option('-v, --verbose', 'Show detailed output', false)
  .action(async (options: { supplier?: string; verbose?: boolean }) => {
    process.exitCode = await syncCommand(options);
  });

process.on('SIGINT', () => {
  console.error(chalk.red('\n\nOperation cancelled by user'));
  process.exit(130);
});

program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportError(error);
});
