// src/lib/records.repository.ts
import { JsonStore, dataStore } from '@/lib/jsonStore';
import { compareDateStringsDesc, formatTimestamp } from '@/lib/time.utils';
import { AddClassInput, ClassScheduleEntry } from '@/models/schedule.types';
import { AttendanceRecord, MarkAttendanceInput } from '@/models/attendance.types';
import { AddAssignmentInput, Assignment } from '@/models/assignment.types';
import { AddEventInput, CalendarEvent } from '@/models/event.types';

/**
 * Append-only school records: class schedule, attendance, assignments and
 * calendar events.
 */
export class RecordsRepository {
  constructor(private readonly store: JsonStore) {}

  async addClass(input: AddClassInput): Promise<ClassScheduleEntry> {
    return this.store.append('schedules', (id) => ({
      id,
      class_name: input.class_name,
      room: input.room,
      time: input.time,
      day: input.day,
      teacher: input.teacher,
      created_at: formatTimestamp(),
    }));
  }

  async getAllClasses(): Promise<ClassScheduleEntry[]> {
    return this.store.read('schedules');
  }

  async markAttendance(input: MarkAttendanceInput): Promise<AttendanceRecord> {
    return this.store.append('attendance', (id) => ({
      id,
      student_name: input.student_name,
      class_name: input.class_name,
      date: input.date,
      status: input.status,
      recorded_at: formatTimestamp(),
    }));
  }

  async getAttendanceRecords(): Promise<AttendanceRecord[]> {
    return this.store.read('attendance');
  }

  async addAssignment(input: AddAssignmentInput): Promise<Assignment> {
    return this.store.append('assignments', (id) => ({
      id,
      title: input.title,
      description: input.description,
      due_date: input.due_date,
      link: input.link,
      created_at: formatTimestamp(),
    }));
  }

  async getAllAssignments(): Promise<Assignment[]> {
    return this.store.read('assignments');
  }

  async addEvent(input: AddEventInput): Promise<CalendarEvent> {
    return this.store.append('events', (id) => ({
      id,
      event_name: input.event_name,
      event_date: input.event_date,
      description: input.description,
      created_at: formatTimestamp(),
    }));
  }

  /**
   * All events, latest event_date first (plain string order).
   */
  async getAllEvents(): Promise<CalendarEvent[]> {
    const events = await this.store.read('events');
    return [...events].sort((a, b) => compareDateStringsDesc(a.event_date, b.event_date));
  }
}

export const recordsRepository = new RecordsRepository(dataStore);
