import { Router } from 'express';
import { config } from '../config/env';
import { ADMIN_USERNAME } from '../services/authService';
import { requestContext } from '../middleware/sessionMiddleware';
import { initializeDatabase } from '../services/setupService';
import { asyncHandler } from '../utils/asyncHandler';

const router = Router();

router.get(
  '/initdb',
  asyncHandler(async (req, res) => {
    const { adminCreated } = await initializeDatabase();
    const context = requestContext(req);
    if (adminCreated) {
      context.flash(
        `Database initialized. Admin user created (username='${ADMIN_USERNAME}', password='${config.adminInitialPassword}'). Keep these credentials private.`,
        'info'
      );
    } else {
      context.flash('Database already initialized.', 'info');
    }
    res.redirect('/login');
  })
);

export default router;
