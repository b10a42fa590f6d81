import chalk from 'chalk';
import { readBomFile } from '../services/bomFile';
import type { SyncService } from '../services/SyncService';
import type { BomLineResult } from '../types';
import { validateNonEmpty } from '../utils/validators';
import { EXIT_FAILURE, EXIT_OK, applyVerbosity, createService, reportError, type CommonOptions } from './common';

const SKIPPED_PREVIEW = 5;

function printLineResult(result: BomLineResult, verbose?: boolean): void {
  switch (result.status) {
    case 'added':
    case 'updated':
      if (verbose) {
        console.log(chalk.green(`  ✅ ${result.status === 'added' ? 'Added to' : 'Updated in'} BOM: ${result.part?.manufacturerPartNumber}`));
      }
      break;
    case 'unchanged':
      if (verbose) {
        console.log(chalk.gray(`  ✓ Already in BOM: ${result.part?.manufacturerPartNumber}`));
      }
      break;
    case 'not_found':
      console.log(chalk.red(`  ❌ Part not found: ${result.partNumber} (row ${result.line.row})`));
      break;
    case 'error':
      console.log(chalk.red(`  ❌ Error processing row ${result.line.row} (${result.partNumber}): ${result.message}`));
      break;
  }
}

export async function bomCommand(
  assemblyNumber: string,
  bomFile: string,
  options: CommonOptions,
  service: SyncService | null = null
): Promise<number> {
  applyVerbosity(options);

  try {
    validateNonEmpty(assemblyNumber, 'Assembly number');
    const sync = service ?? createService();
    if (!sync) {
      return EXIT_FAILURE;
    }

    console.log(`Reading BOM file: ${bomFile}`);
    const bom = readBomFile(bomFile);

    console.log(`Found ${bom.lines.length} items to process`);
    if (bom.skipped.length > 0) {
      console.log(chalk.yellow(`Skipped ${bom.skipped.length} items without MPN/SPN:`));
      for (const item of bom.skipped.slice(0, SKIPPED_PREVIEW)) {
        console.log(chalk.yellow(`  - ${item}`));
      }
      if (bom.skipped.length > SKIPPED_PREVIEW) {
        console.log(chalk.yellow(`  ... and ${bom.skipped.length - SKIPPED_PREVIEW} more`));
      }
    }

    console.log(`\nCreating assembly part: ${assemblyNumber}`);
    const summary = await sync.buildBom(assemblyNumber, bom.lines, {
      onAssembly: (assembly) => {
        const verb = assembly.exists ? 'Using existing' : 'Created';
        console.log(chalk.green(`✅ ${verb} assembly part (ID: ${assembly.partId})`));
        console.log('\nProcessing BOM items...');
      },
      onLineStart: (line, index, total) => {
        if (options.verbose) {
          console.log(chalk.gray(`\n[${index + 1}/${total}] Processing: ${line.spn || line.mpn}`));
        }
      },
      onLine: (result) => printLineResult(result, options.verbose),
    });

    console.log(chalk.green('\n✅ BOM processing complete!'));
    console.log('\n📊 Summary:');
    console.log(`   Assembly Part: ${assemblyNumber}`);
    console.log(`   InvenTree Part ID: ${summary.assembly.partId}`);
    console.log(`   Successfully added: ${summary.added} items`);
    if (summary.updated > 0) {
      console.log(`   Updated: ${summary.updated} items`);
    }
    if (summary.unchanged > 0) {
      console.log(`   Already present: ${summary.unchanged} items`);
    }
    const failed = summary.failed + summary.notFound;
    if (failed > 0) {
      console.log(chalk.red(`   Failed: ${failed} items`));
    }

    return EXIT_OK;
  } catch (error) {
    return reportError(error, options.verbose);
  }
}
