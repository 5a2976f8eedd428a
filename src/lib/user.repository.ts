// src/lib/user.repository.ts
import { config } from '@/config/app.config';
import { JsonStore, dataStore, nextId } from '@/lib/jsonStore';
import { comparePasswords, hashPassword } from '@/lib/auth.utils';
import { formatTimestamp } from '@/lib/time.utils';
import { StudentCreateInput, User } from '@/models/user.types';

/**
 * Users collection: seeding, credential checks, registration and password
 * changes.
 */
export class UserRepository {
  constructor(private readonly store: JsonStore) {}

  /**
   * Seeds the default admin and student accounts when no user exists yet.
   * Returns true when it wrote the defaults.
   */
  async seedDefaultUsers(): Promise<boolean> {
    const existing = await this.store.read('users');
    if (existing.length > 0) {
      return false;
    }

    const [adminHash, studentHash] = await Promise.all([
      hashPassword(config.adminPassword),
      hashPassword('student123'),
    ]);
    const createdAt = formatTimestamp();
    await this.store.update('users', (users) => {
      // another request may have registered someone while we were hashing
      if (users.length > 0) {
        return users;
      }
      return [
        { id: 1, username: 'admin', password_hash: adminHash, role: 'admin', name: 'Administrator', created_at: createdAt },
        { id: 2, username: 'student1', password_hash: studentHash, role: 'student', name: 'John Doe', created_at: createdAt },
      ];
    });
    console.log('[users] Seeded default admin and student accounts.');
    return true;
  }

  async getAll(): Promise<User[]> {
    return this.store.read('users');
  }

  async getUserById(userId: number): Promise<User | null> {
    const users = await this.store.read('users');
    return users.find((user) => user.id === userId) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const users = await this.store.read('users');
    return users.find((user) => user.username === username) ?? null;
  }

  async usernameExists(username: string): Promise<boolean> {
    return (await this.findByUsername(username)) !== null;
  }

  /**
   * Returns the user whose username and password both match, or null.
   * Accounts still carrying a plaintext password are upgraded to a hash on
   * their first successful login.
   */
  async validateUser(username: string, password: string): Promise<User | null> {
    const user = await this.findByUsername(username);
    if (!user) {
      return null;
    }

    if (user.password_hash) {
      return (await comparePasswords(password, user.password_hash)) ? user : null;
    }

    if (user.password === undefined || user.password !== password) {
      return null;
    }

    const upgraded = await this.setPasswordHash(user.id, await hashPassword(password));
    return upgraded ?? user;
  }

  /**
   * Creates a student account. Returns null when the username is already
   * taken; the check runs under the users lock.
   */
  async addStudent(input: StudentCreateInput): Promise<User | null> {
    const passwordHash = await hashPassword(input.password);
    let created: User | null = null;
    await this.store.update('users', (users) => {
      if (users.some((user) => user.username === input.username)) {
        return users;
      }
      const student: User = {
        id: nextId(users),
        username: input.username,
        password_hash: passwordHash,
        role: 'student',
        name: input.name,
        created_at: formatTimestamp(),
      };
      created = student;
      return [...users, student];
    });
    return created;
  }

  /**
   * Sets a new password for the admin with the given id. Returns false when
   * no such admin exists.
   */
  async changePassword(userId: number, newPassword: string): Promise<boolean> {
    const admin = await this.getUserById(userId);
    if (!admin || admin.role !== 'admin') {
      return false;
    }
    return (await this.setPasswordHash(userId, await hashPassword(newPassword))) !== null;
  }

  private async setPasswordHash(userId: number, passwordHash: string): Promise<User | null> {
    let updated: User | null = null;
    await this.store.update('users', (users) =>
      users.map((user) => {
        if (user.id !== userId) {
          return user;
        }
        const { password: _legacy, ...rest } = user;
        updated = { ...rest, password_hash: passwordHash };
        return updated;
      }),
    );
    return updated;
  }
}

export const userRepository = new UserRepository(dataStore);
