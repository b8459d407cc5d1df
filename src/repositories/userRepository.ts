import { InMemoryPageSource, type PageSource } from './pageSource.js';

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  role: string;
  isAdmin: boolean;
  active: boolean;
  createdAt: Date;
}

export interface UserFilters {
  username?: string;
  email?: string;
  role?: string;
  isAdmin?: boolean;
  active?: boolean;
}

export type UserRepository = PageSource<UserRecord, UserFilters>;

/** Every given filter must equal the user's field. */
export function matchesUserFilters(user: UserRecord, filters: UserFilters): boolean {
  if (filters.username !== undefined && user.username !== filters.username) {
    return false;
  }
  if (filters.email !== undefined && user.email !== filters.email) {
    return false;
  }
  if (filters.role !== undefined && user.role !== filters.role) {
    return false;
  }
  if (filters.isAdmin !== undefined && user.isAdmin !== filters.isAdmin) {
    return false;
  }
  if (filters.active !== undefined && user.active !== filters.active) {
    return false;
  }
  return true;
}

/** Newest users first. */
export class InMemoryUserRepository
  extends InMemoryPageSource<UserRecord, UserFilters>
  implements UserRepository
{
  constructor(users: UserRecord[] = []) {
    super(users, {
      matches: matchesUserFilters,
      compare: (a, b) => b.createdAt.getTime() - a.createdAt.getTime(),
    });
  }
}
