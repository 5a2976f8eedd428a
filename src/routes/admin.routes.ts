import { Router } from 'express';
import * as adminController from '@/controllers/admin.controller';
import { requireRole } from '@/middlewares/session.middleware';

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Admin
 *   description: Admin-only settings
 */

/**
 * @swagger
 * /admin_settings:
 *   get:
 *     summary: Password change form
 *     tags: [Admin]
 *     responses:
 *       200:
 *         description: HTML page
 *   post:
 *     summary: Change the signed-in admin's password
 *     tags: [Admin]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [current_password, new_password, confirm_password]
 *             properties:
 *               current_password:
 *                 type: string
 *                 format: password
 *               new_password:
 *                 type: string
 *                 format: password
 *                 minLength: 6
 *               confirm_password:
 *                 type: string
 *                 format: password
 *     responses:
 *       200:
 *         description: Password changed
 *       400:
 *         description: Wrong current password, short new password or mismatched confirmation
 */
router.get('/admin_settings', requireRole('admin'), adminController.showSettings);
router.post('/admin_settings', requireRole('admin'), adminController.changePassword);

/**
 * @swagger
 * /invite_link:
 *   get:
 *     summary: Show the student registration link and invite code
 *     tags: [Admin]
 *     responses:
 *       200:
 *         description: HTML page
 */
router.get('/invite_link', requireRole('admin'), adminController.showInviteLink);

export default router;
