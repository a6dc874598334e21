import mongoose, { Document, Schema } from 'mongoose';

export interface IProduct extends Document {
  sku: string;
  name: string;
  description: string;
  price: number;
  stockQuantity: number;
  minThreshold: number;
  maxThreshold: number;
  barcode?: string;
  category: mongoose.Types.ObjectId;
  isActive: boolean;
  createdBy?: mongoose.Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const ProductSchema = new Schema<IProduct>({
  sku: { type: String, required: true, unique: true, maxlength: 50 },
  name: { type: String, required: true, maxlength: 100 },
  description: { type: String, default: '' },
  price: { type: Number, required: true, min: 0 },
  stockQuantity: { type: Number, required: true, min: 0 },
  minThreshold: { type: Number, required: true, min: 0, default: 0 },
  maxThreshold: {
    type: Number,
    required: true,
    min: 0,
    default: 0,
    validate: {
      validator(this: IProduct, value: number) {
        return value >= this.minThreshold;
      },
      message: 'maxThreshold must be greater than or equal to minThreshold'
    }
  },
  barcode: { type: String, unique: true, sparse: true, maxlength: 100 },
  category: { type: Schema.Types.ObjectId, ref: 'Category', required: true },
  isActive: { type: Boolean, default: true },
  createdBy: { type: Schema.Types.ObjectId, ref: 'User' }
}, {
  timestamps: true
});

ProductSchema.index({ name: 'text', sku: 'text' });

export default mongoose.model<IProduct>('Product', ProductSchema);
