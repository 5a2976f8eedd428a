import { Router } from 'express';
import * as authController from '@/controllers/auth.controller';

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Authentication
 *   description: Login, logout and student self-registration
 */

/**
 * @swagger
 * /:
 *   get:
 *     summary: Redirect to the dashboard for the signed-in role, or to the login page
 *     tags: [Authentication]
 *     security: []
 *     responses:
 *       302:
 *         description: Redirect to /admin_dashboard, /student_dashboard or /login
 */
router.get('/', authController.home);

/**
 * @swagger
 * /login:
 *   post:
 *     summary: Login for any role
 *     tags: [Authentication]
 *     security: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/LoginForm'
 *     responses:
 *       302:
 *         description: Login successful, session cookie set, redirect to the role's dashboard
 *       401:
 *         description: Invalid username or password (login page with the error)
 */
router.get('/login', authController.showLogin('any'));
router.post('/login', authController.login('any'));

/**
 * @swagger
 * /admin_login:
 *   post:
 *     summary: Login restricted to admin accounts
 *     tags: [Authentication]
 *     security: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/LoginForm'
 *     responses:
 *       302:
 *         description: Redirect to /admin_dashboard
 *       401:
 *         description: Invalid admin credentials
 */
router.get('/admin_login', authController.showLogin('admin'));
router.post('/admin_login', authController.login('admin'));

/**
 * @swagger
 * /student_login:
 *   post:
 *     summary: Login restricted to student accounts
 *     tags: [Authentication]
 *     security: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             $ref: '#/components/schemas/LoginForm'
 *     responses:
 *       302:
 *         description: Redirect to /student_dashboard
 *       401:
 *         description: Invalid student credentials
 */
router.get('/student_login', authController.showLogin('student'));
router.post('/student_login', authController.login('student'));

/**
 * @swagger
 * /logout:
 *   get:
 *     summary: Clear the session cookie
 *     tags: [Authentication]
 *     responses:
 *       302:
 *         description: Redirect to /login
 */
router.get('/logout', authController.logout);

/**
 * @swagger
 * /register:
 *   post:
 *     summary: Student self-registration, gated by the invite code
 *     tags: [Authentication]
 *     security: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [name, username, password, confirm_password, invite_code]
 *             properties:
 *               name:
 *                 type: string
 *                 minLength: 2
 *               username:
 *                 type: string
 *                 minLength: 3
 *               password:
 *                 type: string
 *                 format: password
 *                 minLength: 6
 *               confirm_password:
 *                 type: string
 *                 format: password
 *               invite_code:
 *                 type: string
 *     responses:
 *       302:
 *         description: Account created, redirect to /student_login?registered=1
 *       400:
 *         description: Validation failed (registration page with the error)
 */
router.get('/register', authController.showRegister);
router.post('/register', authController.register);

export default router;
