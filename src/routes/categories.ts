import { Router } from 'express';
import {
  getCategories,
  createCategory,
  getCategoryById,
  updateCategory,
  deleteCategory
} from '../controllers/categoryController';
import { authenticateToken, requireCatalogWriter } from '../middleware/auth';

const router = Router();

router.get('/', authenticateToken, getCategories);
router.post('/', authenticateToken, requireCatalogWriter, createCategory);
router.get('/:id', authenticateToken, getCategoryById);
router.put('/:id', authenticateToken, requireCatalogWriter, updateCategory);
router.delete('/:id', authenticateToken, requireCatalogWriter, deleteCategory);

export default router;
