// src/lib/view.utils.ts
import { Identity } from '@/models/auth.types';
import { ClassScheduleEntry } from '@/models/schedule.types';
import { AttendanceRecord } from '@/models/attendance.types';
import { Assignment } from '@/models/assignment.types';
import { CalendarEvent } from '@/models/event.types';
import { SafeHtml, html, raw } from '@/lib/template.utils';

const HIDDEN = raw('style="display:none"');

/**
 * Value for the `{{admin_only}}` token: admin-only blocks are hidden from
 * everyone but admins.
 */
export const adminOnly = (identity?: Identity): SafeHtml => (identity?.role === 'admin' ? raw('') : HIDDEN);

const titleCase = (value: string): string =>
  value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

/**
 * Only http(s) URLs are rendered as clickable links.
 */
export const safeLink = (link: string): string => {
  try {
    const url = new URL(link);
    return url.protocol === 'http:' || url.protocol === 'https:' ? link : '#';
  } catch {
    return '#';
  }
};

export const scheduleRows = (classes: ClassScheduleEntry[]): SafeHtml =>
  html`${classes.map(
    (entry) => html`
        <tr>
            <td>${entry.day}</td>
            <td>${entry.time}</td>
            <td>${entry.class_name}</td>
            <td>${entry.room}</td>
            <td>${entry.teacher}</td>
        </tr>`,
  )}`;

export const attendanceRows = (records: AttendanceRecord[]): SafeHtml =>
  html`${records.map((record) => {
    const statusClass = record.status === 'present' ? 'text-success' : 'text-danger';
    return html`
        <tr>
            <td>${record.date}</td>
            <td>${record.student_name}</td>
            <td>${record.class_name}</td>
            <td><span class="${statusClass}">${titleCase(record.status)}</span></td>
        </tr>`;
  })}`;

export const assignmentRows = (assignments: Assignment[]): SafeHtml =>
  html`${assignments.map(
    (assignment) => html`
        <tr>
            <td>${assignment.title}</td>
            <td>${assignment.description}</td>
            <td>${assignment.due_date}</td>
            <td><a href="${safeLink(assignment.link)}" target="_blank" rel="noopener noreferrer" class="btn btn-sm btn-outline-primary">Open Link</a></td>
        </tr>`,
  )}`;

export const eventItems = (events: CalendarEvent[]): SafeHtml =>
  html`${events.map(
    (event) => html`
        <div class="card mb-2">
            <div class="card-body">
                <h6 class="card-title">${event.event_name}</h6>
                <p class="card-text text-muted">Date: ${event.event_date}</p>
                <p class="card-text">${event.description}</p>
            </div>
        </div>`,
  )}`;
