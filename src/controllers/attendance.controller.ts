// src/controllers/attendance.controller.ts
import { Request, Response, NextFunction } from 'express';
import { recordsRepository } from '@/lib/records.repository';
import { render } from '@/lib/template.utils';
import { MISSING_FIELDS_ERROR, requiredFields } from '@/lib/form.utils';
import { adminOnly, attendanceRows } from '@/lib/view.utils';
import { Identity } from '@/models/auth.types';
import { ATTENDANCE_STATUSES, AttendanceStatus } from '@/models/attendance.types';

const ATTENDANCE_FIELDS = ['student_name', 'class_name', 'date', 'status'] as const;

export const INVALID_STATUS_ERROR = 'Status must be present or absent.';

const isAttendanceStatus = (value: string): value is AttendanceStatus =>
    ATTENDANCE_STATUSES.some((status) => status === value);

const renderAttendance = async (identity: Identity | undefined, error = ''): Promise<string> => {
    const records = await recordsRepository.getAttendanceRecords();
    return render('attendance.html', {
        attendance_rows: attendanceRows(records),
        admin_only: adminOnly(identity),
        error,
    });
};

// GET /attendance - List attendance records
export const listAttendance = async (req: Request, res: Response, next: NextFunction) => {
    try {
        return res.send(await renderAttendance(req.identity));
    } catch (error) {
        next(error);
    }
};

// POST /attendance - Mark attendance for one student (admin only)
export const markAttendance = async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (req.identity?.role === 'admin') {
            const input = requiredFields(req.body, ATTENDANCE_FIELDS);
            if (!input) {
                return res.status(400).send(await renderAttendance(req.identity, MISSING_FIELDS_ERROR));
            }

            const status = input.status.toLowerCase();
            if (!isAttendanceStatus(status)) {
                return res.status(400).send(await renderAttendance(req.identity, INVALID_STATUS_ERROR));
            }

            const record = await recordsRepository.markAttendance({ ...input, status });
            console.log(`[attendance] ${req.identity.username} marked ${record.student_name} ${record.status} on ${record.date}.`);
        }
        return res.send(await renderAttendance(req.identity));
    } catch (error) {
        next(error);
    }
};
