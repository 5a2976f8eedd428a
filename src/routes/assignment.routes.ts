// src/routes/assignment.routes.ts
import { Router } from 'express';
import * as assignmentController from '@/controllers/assignment.controller';

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Assignments
 *   description: Assignments and their cloud links
 */

/**
 * @swagger
 * /assignments:
 *   get:
 *     summary: List assignments
 *     tags: [Assignments]
 *     responses:
 *       200:
 *         description: HTML page with the assignments table
 *   post:
 *     summary: Add an assignment (admins only)
 *     tags: [Assignments]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/AssignmentForm'
 *     responses:
 *       200:
 *         description: HTML page with the updated table
 *       400:
 *         description: A field is missing
 */
router.get('/', assignmentController.listAssignments);
router.post('/', assignmentController.addAssignment);

export default router;
