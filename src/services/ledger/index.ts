import { config } from '../../config';
import { ClientRegistry } from './client.registry';
import { createLedgerRepository } from './ledger.repository';
import { LedgerRepository } from './ledger.types';

export * from './ledger.types';
export { ClientRegistry } from './client.registry';
export { createLedgerRepository } from './ledger.repository';
export { InMemoryLedgerRepository } from './memoryLedger.repository';
export { MongoLedgerRepository } from './mongoLedger.repository';
export { FileLedgerJournal, LedgerJournal } from './ledger.journal';

export const ledgerRepository: LedgerRepository = createLedgerRepository(config.ledger);
export const clientRegistry = new ClientRegistry(ledgerRepository);

/**
 * Seed the provisioning table and warm the registry
 */
export const initializeLedger = async (): Promise<void> => {
  await ledgerRepository.provision(
    config.ledger.provisionedClients.map((client) => ({ clientId: client.id, limit: client.limit }))
  );
  clientRegistry.invalidate();
  await clientRegistry.load();
};
