// src/models/event.types.ts
export interface CalendarEvent {
  id: number;
  event_name: string;
  event_date: string;
  description: string;
  created_at: string;
}

export type AddEventInput = Pick<CalendarEvent, 'event_name' | 'event_date' | 'description'>;
