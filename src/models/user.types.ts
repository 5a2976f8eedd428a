// src/models/user.types.ts
export type Role = 'admin' | 'student';

export const ROLES: readonly Role[] = ['admin', 'student'];

export interface User {
  id: number;
  username: string;
  password_hash?: string;
  password?: string; // legacy plaintext, rehashed on first login
  role: Role;
  name: string;
  created_at?: string;
}

export interface StudentCreateInput {
  name: string;
  username: string;
  password: string;
}
