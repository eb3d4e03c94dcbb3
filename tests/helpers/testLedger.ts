import { config } from '../../src/config';
import {
  InMemoryLedgerRepository,
  ProvisionedClient,
  clientRegistry,
  ledgerRepository,
} from '../../src/services/ledger';

export const REFERENCE_CLIENTS: ProvisionedClient[] = config.ledger.provisionedClients.map(
  (client) => ({ clientId: client.id, limit: client.limit })
);

/**
 * The shared store the app uses under test
 */
export const getTestLedger = (): InMemoryLedgerRepository => {
  if (!(ledgerRepository instanceof InMemoryLedgerRepository)) {
    throw new Error('Tests expect the in-memory ledger store');
  }
  return ledgerRepository;
};

/**
 * Wipe every balance and transaction and re-provision the reference clients
 */
export const resetTestLedger = async (): Promise<void> => {
  const ledger = getTestLedger();
  ledger.reset();
  await ledger.provision(REFERENCE_CLIENTS);
  clientRegistry.invalidate();
  await clientRegistry.load();
};
