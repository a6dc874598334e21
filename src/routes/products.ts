import { Router } from 'express';
import {
  getProducts,
  createProduct,
  getProductById,
  updateProduct,
  deleteProduct,
  restockProduct,
  removeStock,
  getProductInventory
} from '../controllers/productController';
import { authenticateToken, requireCatalogWriter } from '../middleware/auth';

const router = Router();

router.get('/', authenticateToken, getProducts);
router.post('/', authenticateToken, requireCatalogWriter, createProduct);
router.get('/:id', authenticateToken, getProductById);
router.put('/:id', authenticateToken, requireCatalogWriter, updateProduct);
router.delete('/:id', authenticateToken, requireCatalogWriter, deleteProduct);
router.patch('/:id/restock', authenticateToken, requireCatalogWriter, restockProduct);
router.post('/:id/stock-out', authenticateToken, requireCatalogWriter, removeStock);
router.get('/:id/inventory', authenticateToken, getProductInventory);

export default router;
