import mongoose, { Types } from 'mongoose';

import { Client, Transaction } from '../../models';
import {
  CODE_TO_KIND,
  KIND_TO_CODE,
  LedgerEntryInput,
  LedgerMutationResult,
  LedgerRepository,
  LedgerSnapshot,
  LedgerTransaction,
  ProvisionedClient,
  signedAmount,
} from './ledger.types';

/**
 * MongoDB-backed ledger store. Requires a replica set: both operations run
 * inside a multi-document session transaction.
 */
export class MongoLedgerRepository implements LedgerRepository {
  readonly kind = 'mongo' as const;

  /**
   * Insert-if-absent: existing balances and limits are left as they are
   */
  async provision(clients: ProvisionedClient[]): Promise<void> {
    if (clients.length === 0) return;

    await Client.bulkWrite(
      clients.map((client) => ({
        updateOne: {
          filter: { clientId: client.clientId },
          update: {
            $setOnInsert: {
              clientId: client.clientId,
              limit: client.limit,
              balance: 0,
              transactionCount: 0,
            },
          },
          upsert: true,
        },
      }))
    );
  }

  async listClients(): Promise<ProvisionedClient[]> {
    const clients = await Client.find({}, { clientId: 1, limit: 1 }).sort({ clientId: 1 }).lean();
    return clients.map((client) => ({ clientId: client.clientId, limit: client.limit }));
  }

  /**
   * The filter carries the overdraft rule for debits and the safe-integer
   * ceiling for credits, so the check and the $inc are one atomic document
   * update. The transaction record is inserted in
   * the same session transaction and commits with it.
   *
   * Concurrent writers to the same client document hit a write conflict;
   * withTransaction re-runs the callback against the newly committed balance.
   */
  async applyTransaction(clientId: number, entry: LedgerEntryInput): Promise<LedgerMutationResult> {
    const session = await mongoose.startSession();
    let result: LedgerMutationResult = { status: 'not_found' };

    try {
      await session.withTransaction(async () => {
        const filter =
          entry.kind === 'debit'
            ? { clientId, $expr: { $gte: [{ $add: ['$balance', '$limit'] }, entry.amount] } }
            : { clientId, balance: { $lte: Number.MAX_SAFE_INTEGER - entry.amount } };

        const updated = await Client.findOneAndUpdate(
          filter,
          { $inc: { balance: signedAmount(entry), transactionCount: 1 } },
          { new: true, session }
        ).lean();

        if (!updated) {
          const current = await Client.findOne({ clientId }, null, { session }).lean();
          if (!current) {
            result = { status: 'not_found' };
          } else if (entry.kind === 'debit') {
            result = { status: 'limit_exceeded', limit: current.limit, balance: current.balance };
          } else {
            result = { status: 'out_of_range', limit: current.limit, balance: current.balance };
          }
          return;
        }

        const transaction: LedgerTransaction = {
          transactionId: new Types.ObjectId().toHexString(),
          clientId,
          amount: entry.amount,
          kind: entry.kind,
          description: entry.description,
          executedAt: new Date(),
          sequence: updated.transactionCount,
        };

        await Transaction.create(
          [
            {
              transactionId: transaction.transactionId,
              clientId,
              amount: transaction.amount,
              type: KIND_TO_CODE[transaction.kind],
              description: transaction.description,
              sequence: transaction.sequence,
              executedAt: transaction.executedAt,
            },
          ],
          { session }
        );

        result = { status: 'applied', limit: updated.limit, balance: updated.balance, transaction };
      });
    } finally {
      await session.endSession();
    }

    return result;
  }

  /**
   * Balance and the newest transactions are read from one snapshot
   */
  async readStatement(clientId: number, size: number): Promise<LedgerSnapshot | null> {
    const session = await mongoose.startSession();
    let snapshot: LedgerSnapshot | null = null;

    try {
      await session.withTransaction(
        async () => {
          const client = await Client.findOne({ clientId }, null, { session }).lean();
          if (!client) {
            snapshot = null;
            return;
          }

          const transactions = await Transaction.find({ clientId }, null, { session })
            .sort({ executedAt: -1, sequence: -1 })
            .limit(size)
            .lean();

          snapshot = {
            clientId,
            limit: client.limit,
            balance: client.balance,
            transactions: transactions.map((doc) => ({
              transactionId: doc.transactionId,
              clientId: doc.clientId,
              amount: doc.amount,
              kind: CODE_TO_KIND[doc.type],
              description: doc.description,
              executedAt: doc.executedAt,
              sequence: doc.sequence,
            })),
            takenAt: new Date(),
          };
        },
        { readConcern: { level: 'snapshot' } }
      );
    } finally {
      await session.endSession();
    }

    return snapshot;
  }

  isReady(): boolean {
    return mongoose.connection.readyState === 1;
  }
}
