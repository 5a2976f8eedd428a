// src/models/assignment.types.ts
export interface Assignment {
  id: number;
  title: string;
  description: string;
  due_date: string;
  link: string; // Google Drive or any other cloud link
  created_at: string;
}

export type AddAssignmentInput = Pick<Assignment, 'title' | 'description' | 'due_date' | 'link'>;
