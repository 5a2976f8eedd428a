// src/routes/dashboard.routes.ts
import { Router } from 'express';
import * as dashboardController from '@/controllers/dashboard.controller';
import { requireRole, requireSession } from '@/middlewares/session.middleware';

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Dashboards
 *   description: Landing pages after login
 */

/**
 * @swagger
 * /admin_dashboard:
 *   get:
 *     summary: Admin dashboard
 *     tags: [Dashboards]
 *     responses:
 *       200:
 *         description: HTML page
 *       302:
 *         description: Not signed in as an admin, redirect to /login
 */
router.get('/admin_dashboard', requireRole('admin'), dashboardController.adminDashboard);

/**
 * @swagger
 * /student_dashboard:
 *   get:
 *     summary: Student dashboard (admins may view it too)
 *     tags: [Dashboards]
 *     responses:
 *       200:
 *         description: HTML page
 *       302:
 *         description: No session, redirect to /login
 */
router.get('/student_dashboard', requireSession, dashboardController.studentDashboard);

export default router;
