import { Request, Response, NextFunction } from 'express';
import { config } from '@/config/app.config';
import { userRepository } from '@/lib/user.repository';
import { render } from '@/lib/template.utils';
import { formField } from '@/lib/form.utils';
import { clearSession, startSession } from '@/middlewares/session.middleware';
import { Role } from '@/models/user.types';
import { RegisterPayload } from '@/models/auth.types';

interface LoginPage {
    template: string;
    roles: Role[];
    error: string;
}

const LOGIN_PAGES = {
    any: { template: 'login.html', roles: ['admin', 'student'], error: 'Invalid username or password' },
    admin: { template: 'admin_login.html', roles: ['admin'], error: 'Invalid admin credentials' },
    student: { template: 'student_login.html', roles: ['student'], error: 'Invalid student credentials' },
} satisfies Record<string, LoginPage>;

export type LoginKind = keyof typeof LOGIN_PAGES;

export const REGISTERED_MESSAGE = 'Registration successful! Please log in.';

export const dashboardPath = (role: Role): string => (role === 'admin' ? '/admin_dashboard' : '/student_dashboard');

// GET /
export const home = async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (!req.identity) {
            return res.redirect('/login');
        }

        const user = await userRepository.getUserById(req.identity.userId);
        if (!user) {
            clearSession(res);
            return res.redirect('/login');
        }
        return res.redirect(dashboardPath(user.role));
    } catch (error) {
        next(error);
    }
};

// GET /login, /admin_login, /student_login
export const showLogin = (kind: LoginKind) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const message = kind === 'student' && req.query.registered === '1' ? REGISTERED_MESSAGE : '';
            const page = await render(LOGIN_PAGES[kind].template, { error: '', message });
            return res.send(page);
        } catch (error) {
            next(error);
        }
    };
};

// POST /login, /admin_login, /student_login
export const login = (kind: LoginKind) => {
    const page: LoginPage = LOGIN_PAGES[kind];
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const username = formField(req.body, 'username');
            const password = formField(req.body, 'password', { trim: false });

            const user = username && password ? await userRepository.validateUser(username, password) : null;
            if (!user || !page.roles.includes(user.role)) {
                console.log(`[auth] Failed ${kind} login for "${username}".`);
                return res.status(401).send(await render(page.template, { error: page.error, message: '' }));
            }

            startSession(res, user);
            return res.redirect(dashboardPath(user.role));
        } catch (error) {
            next(error);
        }
    };
};

// GET /logout
export const logout = (req: Request, res: Response) => {
    clearSession(res);
    return res.redirect('/login');
};

/**
 * Checks a registration form. Returns the first failing rule's message, or
 * null when the form is acceptable apart from username uniqueness.
 */
export const validateRegistration = (form: RegisterPayload, inviteCode: string = config.inviteCode): string | null => {
    if (form.name.length < 2) {
        return 'Name must be at least 2 characters long.';
    }
    if (form.username.length < 3) {
        return 'Username must be at least 3 characters long.';
    }
    if (form.password.length < 6) {
        return 'Password must be at least 6 characters long.';
    }
    if (form.password !== form.confirm_password) {
        return 'Passwords do not match.';
    }
    if (form.invite_code !== inviteCode) {
        return 'Invalid invite code. Please ask your administrator for the correct code.';
    }
    return null;
};

export const DUPLICATE_USERNAME_ERROR = 'Username already exists. Please choose a different one.';

// GET /register
export const showRegister = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const code = typeof req.query.code === 'string' ? req.query.code : '';
        return res.send(await render('register.html', { error: '', invite_code: code }));
    } catch (error) {
        next(error);
    }
};

// POST /register
export const register = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const form: RegisterPayload = {
            name: formField(req.body, 'name'),
            username: formField(req.body, 'username'),
            password: formField(req.body, 'password', { trim: false }),
            confirm_password: formField(req.body, 'confirm_password', { trim: false }),
            invite_code: formField(req.body, 'invite_code'),
        };

        let error = validateRegistration(form);
        if (!error && (await userRepository.usernameExists(form.username))) {
            error = DUPLICATE_USERNAME_ERROR;
        }
        const student = error
            ? null
            : await userRepository.addStudent({ name: form.name, username: form.username, password: form.password });
        if (!student) {
            return res
                .status(400)
                .send(await render('register.html', { error: error ?? DUPLICATE_USERNAME_ERROR, invite_code: form.invite_code }));
        }
        console.log(`[auth] Registered student "${student.username}" (id ${student.id}).`);
        return res.redirect('/student_login?registered=1');
    } catch (error) {
        next(error);
    }
};
