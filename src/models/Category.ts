import mongoose, { Document, Schema } from 'mongoose';

export interface ICategory extends Document {
  name: string;
  description: string;
  parentCategory?: mongoose.Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const CategorySchema = new Schema<ICategory>({
  name: { type: String, required: true, unique: true, trim: true, maxlength: 255 },
  description: { type: String, default: 'No description provided' },
  parentCategory: { type: Schema.Types.ObjectId, ref: 'Category' }
}, {
  timestamps: true
});

export default mongoose.model<ICategory>('Category', CategorySchema);
