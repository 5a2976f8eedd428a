// src/controllers/schedule.controller.ts
import { Request, Response, NextFunction } from 'express';
import { recordsRepository } from '@/lib/records.repository';
import { render } from '@/lib/template.utils';
import { MISSING_FIELDS_ERROR, requiredFields } from '@/lib/form.utils';
import { adminOnly, scheduleRows } from '@/lib/view.utils';
import { Identity } from '@/models/auth.types';

const CLASS_FIELDS = ['class_name', 'room', 'time', 'day', 'teacher'] as const;

const renderSchedule = async (identity: Identity | undefined, error = ''): Promise<string> => {
    const classes = await recordsRepository.getAllClasses();
    return render('schedule.html', {
        schedule_rows: scheduleRows(classes),
        admin_only: adminOnly(identity),
        error,
    });
};

// GET /schedule - List all scheduled classes
export const listSchedule = async (req: Request, res: Response, next: NextFunction) => {
    try {
        return res.send(await renderSchedule(req.identity));
    } catch (error) {
        next(error);
    }
};

// POST /schedule - Add a class (admin only; anyone else just gets the list)
export const addClass = async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (req.identity?.role === 'admin') {
            const input = requiredFields(req.body, CLASS_FIELDS);
            if (!input) {
                return res.status(400).send(await renderSchedule(req.identity, MISSING_FIELDS_ERROR));
            }
            const entry = await recordsRepository.addClass(input);
            console.log(`[schedule] ${req.identity.username} added class "${entry.class_name}" (id ${entry.id}).`);
        }
        return res.send(await renderSchedule(req.identity));
    } catch (error) {
        next(error);
    }
};
