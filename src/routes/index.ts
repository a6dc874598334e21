import { Router } from 'express';
import authRoutes from './auth';
import categoryRoutes from './categories';
import productRoutes from './products';
import transactionRoutes from './transactions';
import dashboardRoutes from './dashboard';
import reportRoutes from './reports';

export const API_VERSION = 'v1.0.0';

const router = Router();

router.use('/auth', authRoutes);
router.use('/categories', categoryRoutes);
router.use('/products', productRoutes);
router.use('/transactions', transactionRoutes);
router.use('/dashboard', dashboardRoutes);
router.use('/reports', reportRoutes);

router.get('/status', (_req, res) => {
  res.json({
    message: 'Status, OK',
    apiVersion: API_VERSION,
    serverTime: new Date().toISOString()
  });
});

export default router;
