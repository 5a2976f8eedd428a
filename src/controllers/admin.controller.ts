import { Request, Response, NextFunction } from 'express';
import { config } from '@/config/app.config';
import { userRepository } from '@/lib/user.repository';
import { render } from '@/lib/template.utils';
import { formField } from '@/lib/form.utils';
import { ChangePasswordPayload } from '@/models/auth.types';

export const PASSWORD_CHANGED_MESSAGE = 'Password changed successfully!';

/**
 * Returns the first failing rule's message for a password-change form, or
 * null when the change may go ahead.
 */
export const validatePasswordChange = (form: ChangePasswordPayload, currentPasswordMatches: boolean): string | null => {
    if (!currentPasswordMatches) {
        return 'Current password is incorrect.';
    }
    if (form.new_password.length < 6) {
        return 'New password must be at least 6 characters long.';
    }
    if (form.new_password !== form.confirm_password) {
        return 'New passwords do not match.';
    }
    return null;
};

// GET /admin_settings
export const showSettings = async (req: Request, res: Response, next: NextFunction) => {
    try {
        return res.send(await render('admin_settings.html', { error: '', success: '' }));
    } catch (error) {
        next(error);
    }
};

// POST /admin_settings - Change the signed-in admin's password
export const changePassword = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const identity = req.identity;
        if (!identity) {
            return res.redirect('/login');
        }

        const form: ChangePasswordPayload = {
            current_password: formField(req.body, 'current_password', { trim: false }),
            new_password: formField(req.body, 'new_password', { trim: false }),
            confirm_password: formField(req.body, 'confirm_password', { trim: false }),
        };

        const admin = await userRepository.validateUser(identity.username, form.current_password);
        const error = validatePasswordChange(form, admin !== null && admin.id === identity.userId);
        if (error) {
            return res.status(400).send(await render('admin_settings.html', { error, success: '' }));
        }

        const changed = await userRepository.changePassword(identity.userId, form.new_password);
        if (!changed) {
            return res.redirect('/login');
        }
        console.log(`[admin] Password changed for "${identity.username}".`);
        return res.send(await render('admin_settings.html', { error: '', success: PASSWORD_CHANGED_MESSAGE }));
    } catch (error) {
        next(error);
    }
};

export const inviteLinkFor = (origin: string, inviteCode: string = config.inviteCode): string =>
    `${origin}/register?code=${encodeURIComponent(inviteCode)}`;

// GET /invite_link - Registration link to share with students
export const showInviteLink = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const origin = `${req.protocol}://${req.get('host') ?? 'localhost'}`;
        return res.send(
            await render('invite_link.html', {
                invite_link: inviteLinkFor(origin),
                invite_code: config.inviteCode,
            }),
        );
    } catch (error) {
        next(error);
    }
};
