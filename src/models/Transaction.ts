import mongoose, { Document, Schema } from 'mongoose';

import { TransactionTypeCode } from '../services/ledger/ledger.types';

export interface ITransaction extends Document {
  transactionId: string;
  clientId: number;
  amount: number;
  type: TransactionTypeCode;
  description: string;
  sequence: number;
  executedAt: Date;
}

const transactionSchema = new Schema<ITransaction>({
  transactionId: {
    type: String,
    required: true,
    unique: true,
  },
  clientId: {
    type: Number,
    required: true,
  },
  amount: {
    type: Number,
    required: true,
    min: 1,
  },
  type: {
    type: String,
    required: true,
    enum: ['c', 'd'],
  },
  description: {
    type: String,
    required: true,
    validate: {
      validator: (value: string) => [...value].length >= 1 && [...value].length <= 10,
      message: 'description must be 1 to 10 characters',
    },
  },
  sequence: {
    type: Number,
    required: true,
    min: 1,
  },
  executedAt: {
    type: Date,
    required: true,
    default: Date.now,
  },
});

// Statement query: newest first per client
transactionSchema.index({ clientId: 1, executedAt: -1, sequence: -1 });
transactionSchema.index({ clientId: 1, sequence: 1 }, { unique: true });

export const Transaction = mongoose.model<ITransaction>('Transaction', transactionSchema);
