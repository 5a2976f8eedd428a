// src/controllers/assignment.controller.ts
import { Request, Response, NextFunction } from 'express';
import { recordsRepository } from '@/lib/records.repository';
import { render } from '@/lib/template.utils';
import { MISSING_FIELDS_ERROR, requiredFields } from '@/lib/form.utils';
import { adminOnly, assignmentRows } from '@/lib/view.utils';
import { Identity } from '@/models/auth.types';

const ASSIGNMENT_FIELDS = ['title', 'description', 'due_date', 'link'] as const;

const renderAssignments = async (identity: Identity | undefined, error = ''): Promise<string> => {
    const assignments = await recordsRepository.getAllAssignments();
    return render('assignments.html', {
        assignment_rows: assignmentRows(assignments),
        admin_only: adminOnly(identity),
        error,
    });
};

// GET /assignments - List assignments and their links
export const listAssignments = async (req: Request, res: Response, next: NextFunction) => {
    try {
        return res.send(await renderAssignments(req.identity));
    } catch (error) {
        next(error);
    }
};

// POST /assignments - Add an assignment (admin only)
export const addAssignment = async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (req.identity?.role === 'admin') {
            const input = requiredFields(req.body, ASSIGNMENT_FIELDS);
            if (!input) {
                return res.status(400).send(await renderAssignments(req.identity, MISSING_FIELDS_ERROR));
            }
            const assignment = await recordsRepository.addAssignment(input);
            console.log(`[assignments] ${req.identity.username} added "${assignment.title}" (id ${assignment.id}).`);
        }
        return res.send(await renderAssignments(req.identity));
    } catch (error) {
        next(error);
    }
};
