// src/routes/schedule.routes.ts
import { Router } from 'express';
import * as scheduleController from '@/controllers/schedule.controller';
// requireSession is applied in src/routes/index.ts

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Schedule
 *   description: Weekly class schedule
 */

/**
 * @swagger
 * /schedule:
 *   get:
 *     summary: List scheduled classes
 *     tags: [Schedule]
 *     responses:
 *       200:
 *         description: HTML page with the schedule table
 *   post:
 *     summary: Add a class (admins only; other roles get the list unchanged)
 *     tags: [Schedule]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/ClassForm'
 *     responses:
 *       200:
 *         description: HTML page with the updated schedule
 *       400:
 *         description: A field is missing
 */
router.get('/', scheduleController.listSchedule);
router.post('/', scheduleController.addClass);

export default router;
