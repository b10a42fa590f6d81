import chalk from 'chalk';
import { formatPricing } from '../services/partDiff';
import type { SyncService } from '../services/SyncService';
import type { SupplierPartSyncResult, SupplierPartSyncStatus } from '../types';
import {
  EXIT_FAILURE,
  EXIT_OK,
  applyVerbosity,
  createService,
  reportError,
  resolveSupplierOption,
  type SupplierOptions,
} from './common';

export type SyncStats = Record<SupplierPartSyncStatus, number> & { total: number };

export function emptyStats(): SyncStats {
  return { total: 0, up_to_date: 0, updated: 0, not_found: 0, skipped: 0, update_failed: 0, error: 0 };
}

function printResult(result: SupplierPartSyncResult, verbose?: boolean): void {
  const label = `${result.supplier}: ${result.sku}`;

  switch (result.status) {
    case 'up_to_date':
      if (verbose) {
        console.log(chalk.gray(`  ✓ ${label} - ${result.message}`));
      }
      break;
    case 'updated':
      console.log(chalk.cyan(`  🔄 ${label} - ${result.message}`));
      if (verbose && result.changes) {
        if (result.changes.active) {
          console.log(chalk.gray(`      active: ${result.changes.active.old} → ${result.changes.active.new}`));
        }
        if (result.changes.pricing) {
          console.log(
            chalk.gray(
              `      pricing: ${formatPricing(result.changes.pricing.old)} → ${formatPricing(result.changes.pricing.new)}`
            )
          );
        }
      }
      break;
    case 'not_found':
      console.log(chalk.yellow(`  ⚠️  ${label} - ${result.message}`));
      break;
    case 'skipped':
      if (verbose) {
        console.log(chalk.gray(`  - ${label} - ${result.message}`));
      }
      break;
    case 'update_failed':
    case 'error':
      console.log(chalk.red(`  ❌ ${label} - ${result.message}`));
      break;
  }
}

export async function syncCommand(options: SupplierOptions, service: SyncService | null = null): Promise<number> {
  applyVerbosity(options);

  const supplier = resolveSupplierOption(options.supplier);
  if (supplier === false) {
    return EXIT_FAILURE;
  }

  try {
    const sync = service ?? createService();
    if (!sync) {
      return EXIT_FAILURE;
    }

    console.log('🔄 Starting supplier part synchronization...');
    console.log(supplier ? `   Syncing supplier: ${supplier}` : '   Syncing all configured suppliers');
    console.log('\nProcessing supplier parts...');

    const stats = emptyStats();
    for await (const result of sync.syncAllSupplierParts(supplier)) {
      stats.total += 1;
      stats[result.status] += 1;
      printResult(result, options.verbose);
    }

    console.log(chalk.green('\n✅ Synchronization complete!'));
    console.log('\n📊 Summary:');
    console.log(`   Total parts processed: ${stats.total}`);
    console.log(`   Up to date: ${stats.up_to_date}`);
    console.log(`   Updated: ${stats.updated}`);
    if (stats.not_found > 0) {
      console.log(`   Not found in supplier: ${stats.not_found}`);
    }
    if (stats.skipped > 0) {
      console.log(`   Skipped (supplier not configured): ${stats.skipped}`);
    }
    const errors = stats.error + stats.update_failed;
    if (errors > 0) {
      console.log(chalk.red(`   Errors: ${errors}`));
    }

    return EXIT_OK;
  } catch (error) {
    return reportError(error, options.verbose);
  }
}
