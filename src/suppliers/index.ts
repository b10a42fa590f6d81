import type { AppConfig } from '../config';
import { DigikeyClient } from './DigikeyClient';
import { MouserClient } from './MouserClient';
import type { SupplierClient } from './SupplierClient';

export type { SupplierClient } from './SupplierClient';
export { DigikeyClient } from './DigikeyClient';
export { MouserClient } from './MouserClient';

/**
 * Build a client for every configured supplier, DigiKey first
 */
export function createSupplierClients(config: AppConfig): SupplierClient[] {
  const clients: SupplierClient[] = [];

  if (config.digikey) {
    clients.push(new DigikeyClient(config.digikey, undefined, config.requestTimeoutMs));
  }

  if (config.mouser) {
    clients.push(new MouserClient(config.mouser, undefined, config.requestTimeoutMs));
  }

  return clients;
}
