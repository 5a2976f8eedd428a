// src/lib/jsonStore.ts
import fs from 'fs/promises';
import path from 'path';
import { config } from '@/config/app.config';
import { User } from '@/models/user.types';
import { ClassScheduleEntry } from '@/models/schedule.types';
import { AttendanceRecord } from '@/models/attendance.types';
import { Assignment } from '@/models/assignment.types';
import { CalendarEvent } from '@/models/event.types';

/**
 * Record type held by each collection. Every collection is persisted as one
 * JSON array in `<dataDir>/<name>.json`.
 */
export interface CollectionMap {
  users: User;
  schedules: ClassScheduleEntry;
  attendance: AttendanceRecord;
  assignments: Assignment;
  events: CalendarEvent;
}

export type CollectionName = keyof CollectionMap;

export const COLLECTIONS: readonly CollectionName[] = ['users', 'schedules', 'attendance', 'assignments', 'events'];

let tmpCounter = 0;
// fs errors can come from another realm, so no instanceof check
// fs errors may come from another realm (e.g. under Jest), so check the shape
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * String fields a stored record must carry to be usable.
 */
const REQUIRED_FIELDS: { [K in CollectionName]: ReadonlyArray<keyof CollectionMap[K]> } = {
  users: ['username', 'role', 'name'],
  schedules: ['class_name', 'room', 'time', 'day', 'teacher'],
  attendance: ['student_name', 'class_name', 'date', 'status'],
  assignments: ['title', 'description', 'due_date', 'link'],
  events: ['event_name', 'event_date', 'description'],
};

const isRecordOf = <K extends CollectionName>(collection: K, value: unknown): value is CollectionMap[K] => {
  if (typeof value !== 'object' || value === null || !('id' in value) || typeof value.id !== 'number') {
    return false;
  }
  return REQUIRED_FIELDS[collection].every((field) => typeof Reflect.get(value, field) === 'string');
};

/**
 * Whole-file JSON persistence with sequential integer ids.
 *
 * Mutations on one collection are queued behind a per-collection lock, so two
 * appends issued at the same time see each other's writes. Writes go through a
 * temporary file and a rename.
 */
export class JsonStore {
  private readonly locks = new Map<CollectionName, Promise<void>>();

  constructor(private readonly dataDir: string) {}

  filePath(collection: CollectionName): string {
    return path.join(this.dataDir, `${collection}.json`);
  }

  async ensureCollections(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    for (const collection of COLLECTIONS) {
      try {
        await fs.access(this.filePath(collection));
      } catch {
        await this.write(collection, []);
      }
    }
  }

  async read<K extends CollectionName>(collection: K): Promise<CollectionMap[K][]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(collection), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[jsonStore] ${collection}.json is not valid JSON, treating it as empty.`);
      return [];
    }
    if (!Array.isArray(parsed)) {
      console.warn(`[jsonStore] ${collection}.json does not hold an array, treating it as empty.`);
      return [];
    }

    const records = parsed.filter((entry: unknown): entry is CollectionMap[K] => isRecordOf(collection, entry));
    if (records.length < parsed.length) {
      console.warn(`[jsonStore] Skipped ${parsed.length - records.length} malformed record(s) in ${collection}.json.`);
    }
    return records;
  }

  async write<K extends CollectionName>(collection: K, records: CollectionMap[K][]): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    const target = this.filePath(collection);
    const tmp = `${target}.${process.pid}.${++tmpCounter}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(records, null, 4), 'utf-8');
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }

  /**
   * Builds a record with the next free id, stores it and returns it.
   */
  async append<K extends CollectionName>(
    collection: K,
    build: (id: number) => CollectionMap[K],
  ): Promise<CollectionMap[K]> {
    return this.withLock(collection, async () => {
      const records = await this.read(collection);
      const record = build(nextId(records));
      records.push(record);
      await this.write(collection, records);
      return record;
    });
  }

  async update<K extends CollectionName>(
    collection: K,
    mutate: (records: CollectionMap[K][]) => CollectionMap[K][],
  ): Promise<CollectionMap[K][]> {
    return this.withLock(collection, async () => {
      const records = mutate(await this.read(collection));
      await this.write(collection, records);
      return records;
    });
  }

  private async withLock<T>(collection: CollectionName, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(collection) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(collection, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(collection) === settled) {
        this.locks.delete(collection);
      }
    }
  }
}

export const nextId = (records: ReadonlyArray<{ id: number }>): number =>
  records.reduce((max, record) => (typeof record.id === 'number' && record.id > max ? record.id : max), 0) + 1;

export const dataStore = new JsonStore(config.dataDir);
