#!/usr/bin/env tsx
/**
 * CLI script to seed a user into MongoDB
 *
 * Usage:
 *   npm run create-user -- --username Abc --password 123
 *   npm run create-user -- --username admin --password change-me --roles admin,user
 */

import dotenv from 'dotenv';
import { loadConfig } from '@/config';
import { connectDB, disconnectDB } from '@/database/connection';
import { createMongoUserRepository } from '@/database/user.repository';
import { hashPassword } from '@/utils/hash.utils';
import { logger } from '@/utils/logger';

dotenv.config();

interface CLIArgs {
  username: string;
  password: string;
  roles: string[];
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {
    username: '',
    password: '',
    roles: [],
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--username':
        parsed.username = args[++i] ?? '';
        break;
      case '--password':
        parsed.password = args[++i] ?? '';
        break;
      case '--roles':
        parsed.roles = (args[++i] ?? '')
          .split(',')
          .map(role => role.trim())
          .filter(role => role.length > 0);
        break;
    }
  }

  return parsed;
}

function printUsage() {
  console.log(`
Usage:
  npm run create-user -- --username <name> --password <password> [--roles <role,role>]

Options:
  --username <name>      Login name, used as the token subject
  --password <password>  Plain text password, stored as a bcrypt hash
  --roles <list>         Comma separated roles embedded in issued tokens
`);
}

async function main() {
  const args = parseArgs();
  if (!args.username || !args.password) {
    printUsage();
    process.exit(1);
  }

  const config = loadConfig();

  try {
    await connectDB({ uri: config.MONGODB_URI });
    const users = createMongoUserRepository();
    const passwordHash = await hashPassword(args.password, config.BCRYPT_ROUNDS);
    const user = await users.createUser({ username: args.username, passwordHash, roles: args.roles });

    console.log(`\n✓ Created user ${user.username} with roles [${user.roles.join(', ')}]`);
    await disconnectDB();
    process.exit(0);
  } catch (error) {
    logger.error('User creation failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    });

    await disconnectDB();
    process.exit(1);
  }
}

void main();
