// src/routes/calendar.routes.ts
import { Router } from 'express';
import * as calendarController from '@/controllers/calendar.controller';

const router = Router();

/**
 * @swagger
 * /calendar:
 *   get:
 *     summary: List calendar events, latest date first
 *     tags: [Calendar]
 *     responses:
 *       200:
 *         description: HTML page with the event cards
 *   post:
 *     summary: Add an event (admins only)
 *     tags: [Calendar]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/EventForm'
 *     responses:
 *       200:
 *         description: HTML page with the updated list
 *       400:
 *         description: A field is missing
 */
router.get('/', calendarController.listEvents);
router.post('/', calendarController.addEvent);

export default router;
