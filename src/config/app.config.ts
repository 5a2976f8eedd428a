// src/config/app.config.ts
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_SESSION_SECRET = 'dev-session-secret-change-me';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dataDir: string;
  templatesDir: string;
  sessionSecret: string;
  sessionTtlSeconds: number;
  inviteCode: string;
  adminPassword: string;
  bcryptRounds: number;
}

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const resolveDir = (value: string | undefined, fallback: string): string =>
  path.resolve(process.cwd(), value || fallback);

const loadConfig = (): AppConfig => {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const sessionSecret = process.env.SESSION_SECRET || DEFAULT_SESSION_SECRET;

  if (sessionSecret === DEFAULT_SESSION_SECRET) {
    if (nodeEnv === 'production') {
      throw new Error('SESSION_SECRET must be set in production.');
    }
    if (nodeEnv !== 'test') {
      console.warn('[config] SESSION_SECRET is not set, using the development default.');
    }
  }

  return {
    port: toInt(process.env.PORT, 5000),
    nodeEnv,
    dataDir: resolveDir(process.env.DATA_DIR, 'data'),
    templatesDir: resolveDir(process.env.TEMPLATES_DIR, 'templates'),
    sessionSecret,
    sessionTtlSeconds: toInt(process.env.SESSION_TTL_SECONDS, 24 * 60 * 60),
    inviteCode: process.env.INVITE_CODE || 'JOIN2024',
    adminPassword: process.env.ADMIN_PASSWORD || 'admin123',
    bcryptRounds: toInt(process.env.BCRYPT_ROUNDS, 10),
  };
};

export const config: AppConfig = loadConfig();
