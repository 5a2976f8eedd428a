import request from 'supertest';
import { app } from '@/app';
import { loginAsAdmin, loginAsStudent, resetData } from '../helpers';

describe('Admin pages', () => {
  beforeEach(async () => {
    await resetData();
  });

  describe('/admin_settings', () => {
    const change = { current_password: 'admin123', new_password: 'better-pass', confirm_password: 'better-pass' };

    it('is admin only', async () => {
      const student = await loginAsStudent();

      const res = await student.get('/admin_settings');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
    });

    it('ignores a student post', async () => {
      const student = await loginAsStudent();

      const res = await student.post('/admin_settings').type('form').send(change);
      expect(res.status).toBe(302);

      const login = await request(app).post('/login').type('form').send({ username: 'admin', password: 'admin123' });
      expect(login.status).toBe(302);
    });

    it('changes the password', async () => {
      const admin = await loginAsAdmin();

      const res = await admin.post('/admin_settings').type('form').send(change);

      expect(res.status).toBe(200);
      expect(res.text).toContain('<div class="text-success mb-2">Password changed successfully!</div>');

      const oldLogin = await request(app).post('/admin_login').type('form').send({ username: 'admin', password: 'admin123' });
      expect(oldLogin.status).toBe(401);
      const newLogin = await request(app).post('/admin_login').type('form').send({ username: 'admin', password: 'better-pass' });
      expect(newLogin.status).toBe(302);
    });

    it.each<{ override: Partial<typeof change>; message: string }>([
      { override: { current_password: 'wrong-pass' }, message: 'Current password is incorrect.' },
      { override: { new_password: 'short', confirm_password: 'short' }, message: 'New password must be at least 6 characters long.' },
      { override: { confirm_password: 'other-pass' }, message: 'New passwords do not match.' },
    ])('rejects with "$message"', async ({ override, message }) => {
      const admin = await loginAsAdmin();

      const res = await admin.post('/admin_settings').type('form').send({ ...change, ...override });

      expect(res.status).toBe(400);
      expect(res.text).toContain(`<div class="text-danger mb-2">${message}</div>`);
      const login = await request(app).post('/login').type('form').send({ username: 'admin', password: 'admin123' });
      expect(login.status).toBe(302);
    });
  });

  describe('/invite_link', () => {
    it('shows the registration link with the invite code', async () => {
      const admin = await loginAsAdmin();

      const res = await admin.get('/invite_link');

      expect(res.status).toBe(200);
      expect(res.text).toMatch(/<a href="http:\/\/127\.0\.0\.1:\d+\/register\?code=JOIN2024">/);
      expect(res.text).toContain('Invite code: <strong>JOIN2024</strong>');
    });

    it('is admin only', async () => {
      const student = await loginAsStudent();

      const res = await student.get('/invite_link');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
    });
  });
});
