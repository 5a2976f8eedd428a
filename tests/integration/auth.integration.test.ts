import request from 'supertest';
import { app } from '@/app';
import { verifySessionToken } from '@/lib/auth.utils';
import { loginAsAdmin, loginAsStudent, resetData, sessionCookie } from '../helpers';

describe('Authentication routes', () => {
  beforeEach(async () => {
    await resetData();
  });

  describe('GET /', () => {
    it('sends visitors without a session to the login page', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
    });

    it('sends a signed-in student to the student dashboard', async () => {
      const agent = await loginAsStudent();

      const res = await agent.get('/');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/student_dashboard');
    });

    it('sends a signed-in admin to the admin dashboard', async () => {
      const agent = await loginAsAdmin();

      const res = await agent.get('/');

      expect(res.headers.location).toBe('/admin_dashboard');
    });
  });

  describe('GET /login', () => {
    it('renders the login form without an error', async () => {
      const res = await request(app).get('/login');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<form method="POST" action="/login">');
      expect(res.text).toContain('<div class="text-danger mb-2"></div>');
    });
  });

  describe('POST /student_login', () => {
    it('starts a student session and redirects to the student dashboard', async () => {
      const res = await request(app).post('/student_login').type('form').send({ username: 'student1', password: 'student123' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/student_dashboard');

      const token = sessionCookie(res);
      expect(token).not.toBeNull();
      expect(verifySessionToken(token ?? '')).toEqual({ user_id: 2, username: 'student1', role: 'student' });
    });

    it('refuses an admin account', async () => {
      const res = await request(app).post('/student_login').type('form').send({ username: 'admin', password: 'admin123' });

      expect(res.status).toBe(401);
      expect(res.text).toContain('<div class="text-danger mb-2">Invalid student credentials</div>');
      expect(sessionCookie(res)).toBeNull();
    });

    it('shows the registration notice after sign-up', async () => {
      const res = await request(app).get('/student_login?registered=1');

      expect(res.text).toContain('<div class="text-success mb-2">Registration successful! Please log in.</div>');
    });
  });

  describe('POST /admin_login', () => {
    it('starts an admin session', async () => {
      const res = await request(app).post('/admin_login').type('form').send({ username: 'admin', password: 'admin123' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/admin_dashboard');
      expect(verifySessionToken(sessionCookie(res) ?? '')).toEqual({ user_id: 1, username: 'admin', role: 'admin' });
    });

    it('refuses a student account', async () => {
      const res = await request(app).post('/admin_login').type('form').send({ username: 'student1', password: 'student123' });

      expect(res.status).toBe(401);
      expect(res.text).toContain('<div class="text-danger mb-2">Invalid admin credentials</div>');
    });
  });

  describe('POST /login', () => {
    it('rejects a wrong password', async () => {
      const res = await request(app).post('/login').type('form').send({ username: 'admin', password: 'wrong-pass' });

      expect(res.status).toBe(401);
      expect(res.text).toContain('<div class="text-danger mb-2">Invalid username or password</div>');
      expect(sessionCookie(res)).toBeNull();
    });

    it('treats missing fields as a failed login', async () => {
      const res = await request(app).post('/login').type('form').send({ username: 'admin' });

      expect(res.status).toBe(401);
      expect(res.text).toContain('Invalid username or password');
    });

    it('sets an httpOnly, same-site session cookie', async () => {
      const res = await request(app).post('/login').type('form').send({ username: 'admin', password: 'admin123' });

      const cookie = [res.headers['set-cookie']].flat().find((c: unknown) => typeof c === 'string' && c.startsWith('session='));
      expect(cookie).toContain('HttpOnly');
      expect(cookie).toContain('SameSite=Lax');
      expect(cookie).toContain('Path=/');
    });
  });

  describe('GET /logout', () => {
    it('clears the session', async () => {
      const agent = await loginAsStudent();

      const res = await agent.get('/logout');
      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
      expect(sessionCookie(res)).toBe('');

      const after = await agent.get('/student_dashboard');
      expect(after.status).toBe(302);
      expect(after.headers.location).toBe('/login');
    });
  });

  describe('session guards', () => {
    it('redirects a tampered session cookie to login and clears it', async () => {
      const res = await request(app).get('/schedule').set('Cookie', 'session=not-a-token');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
      expect(sessionCookie(res)).toBe('');
    });

    it('keeps students out of the admin dashboard', async () => {
      const agent = await loginAsStudent();

      const res = await agent.get('/admin_dashboard');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
    });

    it('lets admins view the student dashboard', async () => {
      const agent = await loginAsAdmin();

      const res = await agent.get('/student_dashboard');

      expect(res.status).toBe(200);
      expect(res.text).toContain('Welcome, Administrator (admin)');
    });

    it('greets the student by name', async () => {
      const agent = await loginAsStudent();

      const res = await agent.get('/student_dashboard');

      expect(res.status).toBe(200);
      expect(res.text).toContain('Welcome, John Doe (student1)');
    });
  });
});
