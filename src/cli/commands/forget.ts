/**
 * `adaptive-container forget` — delete everything stored for a user.
 */

import { Command } from 'commander';
import { createRuntime, type CommonOptions } from '../runtime.js';

interface ForgetOptions extends CommonOptions {
  user: string;
  force?: boolean;
}

export function createForgetCommand(): Command {
  const cmd = new Command('forget');

  cmd
    .description('Delete learned state and interaction history for a user (destructive)')
    .requiredOption('-u, --user <id>', 'User whose data is deleted')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--storage <path>', 'SQLite database path (overrides config)')
    .option('--force', 'Skip confirmation')
    .action(async (options: ForgetOptions) => {
      await forget(options);
    });

  return cmd;
}

async function forget(options: ForgetOptions): Promise<void> {
  if (!options.force) {
    console.log(`\n  This will permanently delete all data for ${options.user}.`);
    console.log('  Use --force to confirm.\n');
    return;
  }

  const { storage } = createRuntime(options);
  await storage.initialize();
  try {
    await storage.deleteUserData(options.user);
    console.log(`\n  Deleted data for ${options.user}.\n`);
  } finally {
    await storage.release();
  }
}
