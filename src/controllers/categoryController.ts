import { Response } from 'express';
import { AuthRequest } from '../middleware/auth';
import Category, { ICategory } from '../models/Category';
import Product from '../models/Product';
import { sendError, AppError, ErrorCode, NotFoundError } from '../utils/errors';
import { escapeRegex, idParamsSchema, paginationMeta } from '../validators/common.validator';
import { categoryBodySchema, listCategoriesQuerySchema } from '../validators/category.validator';

/**
 * The parent must exist, and on update the chain of ancestors must not lead
 * back to the category itself.
 */
const assertValidParent = async (parentId: string | null | undefined, selfId?: string) => {
  if (!parentId) {
    return;
  }
  if (!selfId) {
    if (!(await Category.exists({ _id: parentId }))) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'Parent category not found', 400);
    }
    return;
  }

  const seen = new Set<string>();
  let current: string | undefined = parentId;

  while (current && !seen.has(current)) {
    if (current === selfId) {
      const message = current === parentId
        ? 'A category cannot be its own parent'
        : 'Category hierarchy cannot contain a cycle';
      throw new AppError(ErrorCode.VALIDATION_ERROR, message, 400);
    }
    seen.add(current);

    const ancestor: ICategory | null = await Category.findById(current).select('parentCategory');
    if (!ancestor) {
      if (current === parentId) {
        throw new AppError(ErrorCode.VALIDATION_ERROR, 'Parent category not found', 400);
      }
      break;
    }
    current = ancestor.parentCategory ? String(ancestor.parentCategory) : undefined;
  }
};

export const getCategories = async (req: AuthRequest, res: Response) => {
  try {
    const query = listCategoriesQuerySchema.parse(req.query);
    const filter = query.search ? { name: { $regex: escapeRegex(query.search), $options: 'i' } } : {};

    const [categories, total] = await Promise.all([
      Category.find(filter)
        .populate('parentCategory', 'name')
        .sort({ name: 1 })
        .skip((query.page - 1) * query.pageSize)
        .limit(query.pageSize),
      Category.countDocuments(filter)
    ]);

    res.json({ categories, pagination: paginationMeta(query, total) });
  } catch (error) {
    sendError(res, error, 'Failed to fetch categories');
  }
};

export const createCategory = async (req: AuthRequest, res: Response) => {
  try {
    const body = categoryBodySchema.parse(req.body);
    await assertValidParent(body.parentCategory);

    const category = new Category({
      name: body.name,
      ...(body.description ? { description: body.description } : {}),
      ...(body.parentCategory ? { parentCategory: body.parentCategory } : {})
    });
    await category.save();

    res.status(201).json({ message: 'Category created successfully', category });
  } catch (error) {
    sendError(res, error, 'Failed to create category');
  }
};

export const getCategoryById = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const category = await Category.findById(id).populate('parentCategory', 'name');
    if (!category) {
      throw new NotFoundError('Category');
    }

    res.json(category);
  } catch (error) {
    sendError(res, error, 'Failed to fetch category');
  }
};

export const updateCategory = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const body = categoryBodySchema.parse(req.body);
    await assertValidParent(body.parentCategory, id);

    const category = await Category.findByIdAndUpdate(
      id,
      {
        name: body.name,
        description: body.description ?? 'No description provided',
        parentCategory: body.parentCategory ?? null
      },
      { new: true, runValidators: true }
    );
    if (!category) {
      throw new NotFoundError('Category');
    }

    res.json({ message: 'Category updated successfully', category });
  } catch (error) {
    sendError(res, error, 'Failed to update category');
  }
};

export const deleteCategory = async (req: AuthRequest, res: Response) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const productCount = await Product.countDocuments({ category: id });
    if (productCount > 0) {
      return res.status(409).json({
        error: 'Category still has products',
        code: ErrorCode.CONFLICT,
        details: { productCount }
      });
    }

    const category = await Category.findByIdAndDelete(id);
    if (!category) {
      throw new NotFoundError('Category');
    }

    await Category.updateMany({ parentCategory: id }, { $unset: { parentCategory: 1 } });

    res.status(204).send();
  } catch (error) {
    sendError(res, error, 'Failed to delete category');
  }
};
