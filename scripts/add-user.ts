#!/usr/bin/env node

/**
 * Adds a login to data/users.json.
 *
 * Usage: node dist/scripts/add-user.js <username> <password>
 */

import 'dotenv/config';
import bcrypt from 'bcrypt';
import { loadUsers, saveUsers } from '../src/utils/io/users';

const SALT_ROUNDS = 10;

async function main(): Promise<void> {
  const [username, password] = process.argv.slice(2);
  if (!username || !password) {
    console.error('Usage: add-user <username> <password>');
    process.exit(1);
  }

  const users = loadUsers();
  if (users.some((user) => user.username === username)) {
    console.error(`Error: User '${username}' already exists`);
    process.exit(1);
  }

  const id = users.reduce((max, user) => Math.max(max, user.id), 0) + 1;
  users.push({ id, username, passwordHash: await bcrypt.hash(password, SALT_ROUNDS) });
  saveUsers(users);
  console.log(`✓ Added user '${username}' with id ${id}`);
}

main().catch((error) => {
  console.error('Failed to add user:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
