// src/routes/attendance.routes.ts
import { Router } from 'express';
import * as attendanceController from '@/controllers/attendance.controller';
// requireSession is applied in src/routes/index.ts

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Attendance
 *   description: Attendance records
 */

/**
 * @swagger
 * /attendance:
 *   get:
 *     summary: List attendance records
 *     tags: [Attendance]
 *     responses:
 *       200:
 *         description: HTML page with the attendance table
 *   post:
 *     summary: Mark attendance for a student (admins only)
 *     tags: [Attendance]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/AttendanceForm'
 *     responses:
 *       200:
 *         description: HTML page with the updated table
 *       400:
 *         description: A field is missing or the status is not present/absent
 */
router.get('/', attendanceController.listAttendance);
router.post('/', attendanceController.markAttendance);

export default router;
