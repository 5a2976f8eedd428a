// tests/helpers.ts
import fs from 'fs/promises';
import request from 'supertest';
import { app } from '@/app';
import { config } from '@/config/app.config';
import { dataStore } from '@/lib/jsonStore';
import { userRepository } from '@/lib/user.repository';

/**
 * Empties the test data directory and seeds the default users
 * (admin/admin123, student1/student123).
 */
export const resetData = async (): Promise<void> => {
  await fs.rm(config.dataDir, { recursive: true, force: true });
  await dataStore.ensureCollections();
  await userRepository.seedDefaultUsers();
};

/**
 * Logs in through the given login page and returns an agent that carries the
 * session cookie.
 */
export const loginAs = async (username: string, password: string, page = '/login') => {
  const agent = request.agent(app);
  const res = await agent.post(page).type('form').send({ username, password });
  if (res.status !== 302) {
    throw new Error(`Login for ${username} failed with status ${res.status}`);
  }
  return agent;
};

export const loginAsAdmin = () => loginAs('admin', 'admin123');
export const loginAsStudent = () => loginAs('student1', 'student123');

/**
 * Value of the session cookie set by a response, or null when none was set.
 */
export const sessionCookie = (res: request.Response): string | null => {
  const raw: unknown = res.headers['set-cookie'];
  const cookies = Array.isArray(raw) ? raw.filter((c): c is string => typeof c === 'string') : typeof raw === 'string' ? [raw] : [];
  for (const cookie of cookies) {
    const match = /^session=([^;]*)/.exec(cookie);
    if (match) {
      return match[1];
    }
  }
  return null;
};
