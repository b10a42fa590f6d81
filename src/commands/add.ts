import chalk from 'chalk';
import type { SyncService } from '../services/SyncService';
import type { SyncPartResult } from '../types';
import { validateNonEmpty } from '../utils/validators';
import {
  EXIT_FAILURE,
  EXIT_OK,
  applyVerbosity,
  createService,
  reportError,
  resolveSupplierOption,
  type SupplierOptions,
} from './common';

function createdSummary(result: SyncPartResult): string {
  const created = Object.entries(result.created)
    .filter(([, wasCreated]) => wasCreated)
    .map(([entity]) => entity);
  return created.length > 0 ? created.join(', ') : 'nothing (all records existed)';
}

export async function addCommand(
  partNumber: string,
  options: SupplierOptions,
  service: SyncService | null = null
): Promise<number> {
  applyVerbosity(options);

  const supplier = resolveSupplierOption(options.supplier);
  if (supplier === false) {
    return EXIT_FAILURE;
  }

  try {
    validateNonEmpty(partNumber, 'Part number');
    const sync = service ?? createService();
    if (!sync) {
      return EXIT_FAILURE;
    }

    console.log(`Searching for part: ${partNumber}`);
    if (supplier) {
      console.log(`Using supplier: ${supplier}`);
    }

    const result = await sync.syncPart(partNumber, supplier);

    if (!result) {
      console.error(chalk.red(`❌ Part '${partNumber}' not found`));
      const searched = supplier ? supplier : sync.getConfiguredSuppliers().join(', ');
      console.error(chalk.gray(`   Searched in: ${searched}`));
      return EXIT_FAILURE;
    }

    console.log(chalk.green('\n✅ Successfully synced part to InvenTree!'));
    console.log('\n📦 Part Information:');
    console.log(`   Manufacturer: ${result.manufacturer}`);
    console.log(`   MPN: ${result.manufacturerPartNumber}`);
    console.log(`   Supplier: ${result.supplier}`);
    console.log(`   SKU: ${result.supplierPartNumber}`);

    if (options.verbose) {
      console.log('\n📝 Details:');
      console.log(`   Description: ${result.description}`);
      console.log(`   InvenTree Part ID: ${result.partId}`);
      console.log(`   InvenTree Supplier Part ID: ${result.supplierPartId}`);
      console.log(`   Created: ${createdSummary(result)}`);
      if (result.supplierPartUpdated) {
        console.log('   Supplier part pricing/status updated');
      }
      if (result.imageUploaded) {
        console.log('   Image uploaded');
      }
    }

    return EXIT_OK;
  } catch (error) {
    return reportError(error, options.verbose);
  }
}
