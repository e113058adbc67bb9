// Hierarchy Index — manager/subordinate lookups over the fetched user list

import type { UserRecord } from '../types';

const NO_USERS: readonly UserRecord[] = [];

/**
 * In-memory index built once per run. The user list does not change during a run,
 * so the index is never rebuilt.
 */
class HierarchyIndex {
  private users = new Map<string, UserRecord>();
  private subordinates = new Map<string, UserRecord[]>();
  private ordered: readonly UserRecord[];

  constructor(users: readonly UserRecord[]) {
    this.ordered = users;
    for (const user of users) {
      if (!this.users.has(user.id)) this.users.set(user.id, user);
      if (user.managerId) {
        const reports = this.subordinates.get(user.managerId);
        if (reports) reports.push(user);
        else this.subordinates.set(user.managerId, [user]);
      }
    }
  }

  get size(): number {
    return this.users.size;
  }

  /** Direct reports of a manager, in user-list order */
  subordinatesOf(managerId: string): readonly UserRecord[] {
    return this.subordinates.get(managerId) ?? NO_USERS;
  }

  recordOf(userId: string): UserRecord | undefined {
    return this.users.get(userId);
  }

  usersWithRole(role: number): UserRecord[] {
    return this.ordered.filter((user) => user.role === role);
  }
}

export default HierarchyIndex;
