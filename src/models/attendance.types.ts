// src/models/attendance.types.ts
export type AttendanceStatus = 'present' | 'absent';

export const ATTENDANCE_STATUSES: readonly AttendanceStatus[] = ['present', 'absent'];

export interface AttendanceRecord {
  id: number;
  student_name: string;
  class_name: string;
  date: string; // YYYY-MM-DD
  status: AttendanceStatus;
  recorded_at: string;
}

export interface MarkAttendanceInput {
  student_name: string;
  class_name: string;
  date: string;
  status: AttendanceStatus;
}
