// src/routes/index.ts
import { Router } from 'express';
import authRoutes from './auth.routes';
import dashboardRoutes from './dashboard.routes';
import scheduleRoutes from './schedule.routes';
import attendanceRoutes from './attendance.routes';
import assignmentRoutes from './assignment.routes';
import calendarRoutes from './calendar.routes';
import adminRoutes from './admin.routes';
import { requireRole, requireSession } from '@/middlewares/session.middleware';

const router = Router();

// Public pages: login, logout, registration
router.use('/', authRoutes);

// Dashboards carry their own guards (admin dashboard is admin only)
router.use('/', dashboardRoutes);

// List pages: any signed-in user may read, controllers only accept admin posts
router.use('/schedule', requireSession, scheduleRoutes);
router.use('/attendance', requireSession, attendanceRoutes);
router.use('/assignments', requireSession, assignmentRoutes);
router.use('/calendar', requireSession, calendarRoutes);

// Admin pages, guarded route by route
router.use('/', adminRoutes);

export default router;
