import { checkExists, load, save } from './io';
import { AuthUser, UsersData } from './types';

const FILE_NAME = 'users';

export function loadUsers(): AuthUser[] {
  if (!checkExists(`${FILE_NAME}.json`)) {
    return [];
  }
  const data = load<UsersData>(`${FILE_NAME}.json`);
  return data.users || [];
}

export function saveUsers(users: AuthUser[]): void {
  save<UsersData>({ users }, `${FILE_NAME}.json`);
}
