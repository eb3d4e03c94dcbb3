import { LedgerStoreKind } from '../../config';
import { FileLedgerJournal } from './ledger.journal';
import { InMemoryLedgerRepository } from './memoryLedger.repository';
import { MongoLedgerRepository } from './mongoLedger.repository';
import { LedgerRepository } from './ledger.types';

export interface LedgerRepositoryOptions {
  store: LedgerStoreKind;
  journalPath?: string;
}

export const createLedgerRepository = (options: LedgerRepositoryOptions): LedgerRepository => {
  if (options.store === 'mongo') {
    return new MongoLedgerRepository();
  }

  return new InMemoryLedgerRepository({
    journal: options.journalPath ? new FileLedgerJournal(options.journalPath) : undefined,
  });
};
