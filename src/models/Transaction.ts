import mongoose, { Document, Schema } from 'mongoose';

export const TRANSACTION_TYPES = ['STOCK_IN', 'STOCK_OUT'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface ITransaction extends Document {
  type: TransactionType;
  productId: mongoose.Types.ObjectId;
  quantity: number;
  note?: string;
  createdBy?: mongoose.Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const TransactionSchema = new Schema<ITransaction>({
  type: { type: String, enum: [...TRANSACTION_TYPES], required: true },
  productId: { type: Schema.Types.ObjectId, ref: 'Product', required: true, index: true },
  quantity: { type: Number, required: true, min: 1 },
  note: { type: String },
  createdBy: { type: Schema.Types.ObjectId, ref: 'User' }
}, {
  timestamps: true
});

export default mongoose.model<ITransaction>('Transaction', TransactionSchema);
