// src/controllers/calendar.controller.ts
import { Request, Response, NextFunction } from 'express';
import { recordsRepository } from '@/lib/records.repository';
import { render } from '@/lib/template.utils';
import { MISSING_FIELDS_ERROR, requiredFields } from '@/lib/form.utils';
import { adminOnly, eventItems } from '@/lib/view.utils';
import { Identity } from '@/models/auth.types';

const EVENT_FIELDS = ['event_name', 'event_date', 'description'] as const;

const renderCalendar = async (identity: Identity | undefined, error = ''): Promise<string> => {
    const events = await recordsRepository.getAllEvents();
    return render('calendar.html', {
        event_items: eventItems(events),
        admin_only: adminOnly(identity),
        error,
    });
};

// GET /calendar - Important dates, latest first
export const listEvents = async (req: Request, res: Response, next: NextFunction) => {
    try {
        return res.send(await renderCalendar(req.identity));
    } catch (error) {
        next(error);
    }
};

// POST /calendar - Add an event (admin only)
export const addEvent = async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (req.identity?.role === 'admin') {
            const input = requiredFields(req.body, EVENT_FIELDS);
            if (!input) {
                return res.status(400).send(await renderCalendar(req.identity, MISSING_FIELDS_ERROR));
            }
            const event = await recordsRepository.addEvent(input);
            console.log(`[calendar] ${req.identity.username} added "${event.event_name}" on ${event.event_date}.`);
        }
        return res.send(await renderCalendar(req.identity));
    } catch (error) {
        next(error);
    }
};
