import mongoose, { Document, Schema } from 'mongoose';

export interface IClient extends Document {
  clientId: number;
  limit: number;
  balance: number;
  /** Applied transactions so far; the next one gets transactionCount + 1 as its sequence */
  transactionCount: number;
  createdAt: Date;
  updatedAt: Date;
}

const clientSchema = new Schema<IClient>(
  {
    clientId: {
      type: Number,
      required: true,
      unique: true,
      index: true,
      min: 1,
    },
    limit: {
      type: Number,
      required: true,
      min: 0,
    },
    balance: {
      type: Number,
      required: true,
      default: 0,
    },
    transactionCount: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
  },
  {
    timestamps: true,
  }
);

export const Client = mongoose.model<IClient>('Client', clientSchema);
