// src/controllers/dashboard.controller.ts
import { Request, Response, NextFunction } from 'express';
import { userRepository } from '@/lib/user.repository';
import { render } from '@/lib/template.utils';

const renderDashboard = (template: string) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const identity = req.identity;
            const user = identity ? await userRepository.getUserById(identity.userId) : null;
            return res.send(
                await render(template, {
                    name: user?.name ?? identity?.username ?? '',
                    username: identity?.username ?? '',
                }),
            );
        } catch (error) {
            next(error);
        }
    };
};

// GET /admin_dashboard
export const adminDashboard = renderDashboard('admin_dashboard.html');

// GET /student_dashboard - students and admins
export const studentDashboard = renderDashboard('student_dashboard.html');
