// src/models/schedule.types.ts
export interface ClassScheduleEntry {
  id: number;
  class_name: string;
  room: string;
  time: string;
  day: string;
  teacher: string;
  created_at: string;
}

export type AddClassInput = Pick<ClassScheduleEntry, 'class_name' | 'room' | 'time' | 'day' | 'teacher'>;
