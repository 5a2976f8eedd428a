import request from 'supertest';
import { app } from '@/app';
import { userRepository } from '@/lib/user.repository';
import { loginAs, resetData } from '../helpers';

const form = {
  name: 'Ana Lima',
  username: 'ana',
  password: 'secret1',
  confirm_password: 'secret1',
  invite_code: 'JOIN2024',
};

describe('Student registration', () => {
  beforeEach(async () => {
    await resetData();
  });

  it('pre-fills the invite code from the link', async () => {
    const res = await request(app).get('/register?code=JOIN2024');

    expect(res.status).toBe(200);
    expect(res.text).toContain('name="invite_code" value="JOIN2024"');
  });

  it('escapes a crafted invite code in the form', async () => {
    const res = await request(app).get('/register').query({ code: '"><script>' });

    expect(res.text).toContain('value="&quot;&gt;&lt;script&gt;"');
  });

  it('creates a student and sends them to the student login', async () => {
    const res = await request(app).post('/register').type('form').send(form);

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/student_login?registered=1');

    const created = await userRepository.findByUsername('ana');
    expect(created).toMatchObject({ id: 3, username: 'ana', role: 'student', name: 'Ana Lima' });
    expect(created?.password_hash).toMatch(/^\$2/);

    const agent = await loginAs('ana', 'secret1', '/student_login');
    const dashboard = await agent.get('/student_dashboard');
    expect(dashboard.text).toContain('Welcome, Ana Lima (ana)');
  });

  it('rejects a wrong invite code and stores nothing', async () => {
    const res = await request(app).post('/register').type('form').send({ ...form, invite_code: 'WRONG' });

    expect(res.status).toBe(400);
    expect(res.text).toContain('Invalid invite code. Please ask your administrator for the correct code.');
    await expect(userRepository.getAll()).resolves.toHaveLength(2);
  });

  it('rejects a username that already exists', async () => {
    const res = await request(app).post('/register').type('form').send({ ...form, username: 'student1' });

    expect(res.status).toBe(400);
    expect(res.text).toContain('Username already exists. Please choose a different one.');
    await expect(userRepository.getAll()).resolves.toHaveLength(2);
  });

  it('checks lengths before the invite code', async () => {
    const res = await request(app)
      .post('/register')
      .type('form')
      .send({ ...form, username: 'an', invite_code: 'WRONG' });

    expect(res.status).toBe(400);
    expect(res.text).toContain('Username must be at least 3 characters long.');
    expect(res.text).not.toContain('Invalid invite code');
  });

  it('trims the name and username before checking them', async () => {
    const res = await request(app)
      .post('/register')
      .type('form')
      .send({ ...form, name: '  A  ' });

    expect(res.status).toBe(400);
    expect(res.text).toContain('Name must be at least 2 characters long.');
  });

  it('rejects mismatched passwords', async () => {
    const res = await request(app)
      .post('/register')
      .type('form')
      .send({ ...form, confirm_password: 'secret2' });

    expect(res.status).toBe(400);
    expect(res.text).toContain('Passwords do not match.');
  });
});
