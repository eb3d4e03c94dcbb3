export type TransactionKind = 'credit' | 'debit';

/**
 * Single-character codes used on the wire and in storage
 */
export type TransactionTypeCode = 'c' | 'd';

export const KIND_TO_CODE: Record<TransactionKind, TransactionTypeCode> = {
  credit: 'c',
  debit: 'd',
};

export const CODE_TO_KIND: Record<TransactionTypeCode, TransactionKind> = {
  c: 'credit',
  d: 'debit',
};

export interface ProvisionedClient {
  clientId: number;
  limit: number;
}

export interface LedgerEntryInput {
  amount: number;
  kind: TransactionKind;
  description: string;
}

export interface LedgerTransaction {
  transactionId: string;
  clientId: number;
  amount: number;
  kind: TransactionKind;
  description: string;
  executedAt: Date;
  /** 1-based insertion order within the client */
  sequence: number;
}

export type LedgerMutationResult =
  | { status: 'applied'; limit: number; balance: number; transaction: LedgerTransaction }
  | { status: 'limit_exceeded'; limit: number; balance: number }
  | { status: 'out_of_range'; limit: number; balance: number }
  | { status: 'not_found' };

export interface LedgerSnapshot {
  clientId: number;
  limit: number;
  balance: number;
  /** Newest first */
  transactions: LedgerTransaction[];
  takenAt: Date;
}

/**
 * Durable client ledger plus its transaction log.
 *
 * applyTransaction is one atomic unit per client: the overdraft check, the
 * balance update and the log append commit together or not at all.
 * readStatement returns balance and transactions from one consistent point.
 */
export interface LedgerRepository {
  readonly kind: 'mongo' | 'memory';
  provision(clients: ProvisionedClient[]): Promise<void>;
  listClients(): Promise<ProvisionedClient[]>;
  applyTransaction(clientId: number, entry: LedgerEntryInput): Promise<LedgerMutationResult>;
  readStatement(clientId: number, size: number): Promise<LedgerSnapshot | null>;
  isReady(): boolean;
}

/**
 * Signed effect of an entry on the balance
 */
export const signedAmount = (entry: Pick<LedgerEntryInput, 'amount' | 'kind'>): number => {
  return entry.kind === 'credit' ? entry.amount : -entry.amount;
};

/**
 * Debits may take the balance down to -limit and no further
 */
export const isWithinLimit = (balance: number, limit: number): boolean => {
  return balance >= -limit;
};

/**
 * Balances stay exact integers: past Number.MAX_SAFE_INTEGER they would round
 */
export const isBalanceInRange = (balance: number): boolean => {
  return Number.isSafeInteger(balance);
};

export const isTransactionTypeCode = (value: unknown): value is TransactionTypeCode => {
  return value === 'c' || value === 'd';
};

export const toTransactionKind = (code: unknown): TransactionKind | undefined => {
  return isTransactionTypeCode(code) ? CODE_TO_KIND[code] : undefined;
};
