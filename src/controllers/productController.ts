import { Response } from 'express';
import mongoose, { FilterQuery } from 'mongoose';
import { AuthRequest } from '../middleware/auth';
import Product, { IProduct } from '../models/Product';
import Category from '../models/Category';
import Transaction, { TransactionType } from '../models/Transaction';
import { notifyLowStock } from '../utils/inventoryAlerts';
import { generateUniqueSku } from '../utils/sku';
import { classifyStock, stockLevelPercent } from '../utils/stockReport';
import { sendError, AppError, ErrorCode, NotFoundError } from '../utils/errors';
import { escapeRegex, idParamsSchema, paginationMeta } from '../validators/common.validator';
import {
  ListProductsQuery,
  listProductsQuerySchema,
  productBodySchema,
  stockChangeSchema
} from '../validators/product.validator';
import { logger } from '../config/logger';

export const withStockStatus = (product: IProduct) => ({
  ...product.toObject(),
  stockStatus: classifyStock(product.stockQuantity, product.minThreshold),
  stockLevelPct: stockLevelPercent(product.stockQuantity, product.maxThreshold)
});

const findCategoryByName = async (name: string) => {
  const category = await Category.findOne({ name });
  if (!category) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, `No category with name ${name}`, 400);
  }
  return category;
};

const recordTransaction = async (
  type: TransactionType,
  product: IProduct,
  quantity: number,
  req: AuthRequest,
  note?: string
) => {
  const transaction = new Transaction({
    type,
    productId: product._id,
    quantity,
    note,
    createdBy: req.user?._id
  });
  await transaction.save();
  return transaction;
};

export const buildProductFilter = async (query: ListProductsQuery): Promise<FilterQuery<IProduct>> => {
  const filter: FilterQuery<IProduct> = { isActive: true };

  if (query.name) {
    filter.name = { $regex: escapeRegex(query.name), $options: 'i' };
  }

  if (query.category) {
    const categories = await Category.find({
      name: { $regex: escapeRegex(query.category), $options: 'i' }
    }).select('_id');
    filter.category = { $in: categories.map((category) => category._id) };
  }

  if (query.minPrice !== undefined || query.maxPrice !== undefined) {
    filter.price = {
      ...(query.minPrice !== undefined ? { $gte: query.minPrice } : {}),
      ...(query.maxPrice !== undefined ? { $lte: query.maxPrice } : {})
    };
  }

  switch (query.status) {
    case 'out':
      filter.stockQuantity = 0;
      break;
    case 'low':
      filter.stockQuantity = { $gt: 0 };
      filter.$expr = { $lte: ['$stockQuantity', '$minThreshold'] };
      break;
    case 'normal':
      filter.$expr = { $gt: ['$stockQuantity', '$minThreshold'] };
      break;
    default:
      break;
  }

  return filter;
};

export const getProducts = async (req: AuthRequest, res: Response) => {
  try {
    const query = listProductsQuerySchema.parse(req.query);
    const filter = await buildProductFilter(query);

    const [products, total] = await Promise.all([
      Product.find(filter)
        .populate('category', 'name')
        .sort({ name: 1 })
        .skip((query.page - 1) * query.pageSize)
        .limit(query.pageSize),
      Product.countDocuments(filter)
    ]);

    res.json({
      products: products.map(withStockStatus),
      pagination: paginationMeta(query, total)
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch products');
  }
};

export const createProduct = async (req: AuthRequest, res: Response) => {
  try {
    const body = productBodySchema.parse(req.body);
    const category = await findCategoryByName(body.category);

    const sku = await generateUniqueSku(body.name, category.name, async (candidate) =>
      Boolean(await Product.exists({ sku: candidate }))
    );

    const product = new Product({
      sku,
      name: body.name,
      description: body.description,
      price: body.price,
      stockQuantity: body.stockQuantity,
      minThreshold: body.minThreshold,
      maxThreshold: body.maxThreshold,
      barcode: body.barcode || undefined,
      category: category._id,
      createdBy: req.user?._id
    });
    await product.save();

    if (product.stockQuantity > 0) {
      await recordTransaction('STOCK_IN', product, product.stockQuantity, req, 'Initial stock');
    }

    logger.info('Product created', { productId: product.id, sku });
    await notifyLowStock(product);

    res.status(201).json({ message: 'Product created successfully', product: withStockStatus(product) });
  } catch (error) {
    sendError(res, error, 'Failed to create product');
  }
};

export const getProductById = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const product = await Product.findById(id).populate('category', 'name');
    if (!product) {
      throw new NotFoundError('Product');
    }

    res.json(withStockStatus(product));
  } catch (error) {
    sendError(res, error, 'Failed to fetch product');
  }
};

export const updateProduct = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const body = productBodySchema.parse(req.body);
    const category = await findCategoryByName(body.category);

    const product = await Product.findById(id);
    if (!product) {
      throw new NotFoundError('Product');
    }

    const delta = body.stockQuantity - product.stockQuantity;

    product.set({
      name: body.name,
      description: body.description,
      price: body.price,
      stockQuantity: body.stockQuantity,
      minThreshold: body.minThreshold,
      maxThreshold: body.maxThreshold,
      barcode: body.barcode || undefined,
      category: category._id
    });
    await product.save();

    if (delta !== 0) {
      await recordTransaction(delta > 0 ? 'STOCK_IN' : 'STOCK_OUT', product, Math.abs(delta), req, 'Stock corrected on update');
    }

    await notifyLowStock(product);

    res.json({ message: 'Product updated successfully', product: withStockStatus(product) });
  } catch (error) {
    sendError(res, error, 'Failed to update product');
  }
};

export const deleteProduct = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const product = await Product.findById(id);
    if (!product) {
      throw new NotFoundError('Product');
    }

    // Remaining stock leaves the books with the product
    if (product.stockQuantity > 0) {
      await recordTransaction('STOCK_OUT', product, product.stockQuantity, req, 'Product deleted');
    }

    await product.deleteOne();
    logger.info('Product deleted', { productId: id, sku: product.sku });

    res.status(204).send();
  } catch (error) {
    sendError(res, error, 'Failed to delete product');
  }
};

export const restockProduct = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const { quantity, note } = stockChangeSchema.parse(req.body);

    const product = await Product.findByIdAndUpdate(id, { $inc: { stockQuantity: quantity } }, { new: true });
    if (!product) {
      throw new NotFoundError('Product');
    }

    const transaction = await recordTransaction('STOCK_IN', product, quantity, req, note);
    await notifyLowStock(product);

    res.json({ message: 'Stock added successfully', product: withStockStatus(product), transaction });
  } catch (error) {
    sendError(res, error, 'Failed to add stock');
  }
};

export const removeStock = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const { quantity, note } = stockChangeSchema.parse(req.body);

    // The quantity guard and decrement happen in one atomic update
    const product = await Product.findOneAndUpdate(
      { _id: id, stockQuantity: { $gte: quantity } },
      { $inc: { stockQuantity: -quantity } },
      { new: true }
    );

    if (!product) {
      const existing = await Product.findById(id).select('stockQuantity');
      if (!existing) {
        throw new NotFoundError('Product');
      }
      throw new AppError(ErrorCode.INSUFFICIENT_STOCK, 'Insufficient stock', 409, {
        requested: quantity,
        available: existing.stockQuantity
      });
    }

    const transaction = await recordTransaction('STOCK_OUT', product, quantity, req, note);
    await notifyLowStock(product);

    res.json({ message: 'Stock removed successfully', product: withStockStatus(product), transaction });
  } catch (error) {
    sendError(res, error, 'Failed to remove stock');
  }
};

interface MovementTotal {
  _id: TransactionType;
  total: number;
  lastMovement: Date;
}

export const getProductInventory = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const product = await Product.findById(id);
    if (!product) {
      throw new NotFoundError('Product');
    }

    const totals = await Transaction.aggregate<MovementTotal>([
      { $match: { productId: new mongoose.Types.ObjectId(id) } },
      { $group: { _id: '$type', total: { $sum: '$quantity' }, lastMovement: { $max: '$createdAt' } } }
    ]);

    const totalFor = (type: TransactionType) => totals.find((entry) => entry._id === type)?.total ?? 0;
    const lastUpdated = totals.reduce(
      (latest, entry) => (entry.lastMovement > latest ? entry.lastMovement : latest),
      product.updatedAt
    );

    res.json({
      productId: id,
      sku: product.sku,
      stockIn: totalFor('STOCK_IN'),
      stockOut: totalFor('STOCK_OUT'),
      currentStock: product.stockQuantity,
      lastUpdated
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch product inventory');
  }
};
