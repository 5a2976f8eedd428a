// src/models/auth.types.ts
import { Role } from '@/models/user.types';

export interface LoginPayload {
    username: string;
    password: string;
}

export interface RegisterPayload {
    name: string;
    username: string;
    password: string;
    confirm_password: string;
    invite_code: string;
}

export interface ChangePasswordPayload {
    current_password: string;
    new_password: string;
    confirm_password: string;
}

/**
 * Claims carried by the session cookie.
 */
export interface SessionPayload {
    user_id: number;
    username: string;
    role: Role;
}

/**
 * Authenticated identity attached to a request by the session middleware.
 */
export interface Identity {
    userId: number;
    username: string;
    role: Role;
}
