/**
 * `adaptive-container inspect` — show a user's stored state and history.
 */

import { Command } from 'commander';
import { createRuntime, type CommonOptions } from '../runtime.js';

interface InspectOptions extends CommonOptions {
  user: string;
  limit: string;
  json?: boolean;
}

export function createInspectCommand(): Command {
  const cmd = new Command('inspect');

  cmd
    .description('Show stored engine state and recent interactions for a user')
    .requiredOption('-u, --user <id>', 'User to inspect')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-n, --limit <count>', 'Recent interactions to list', '10')
    .option('--storage <path>', 'SQLite database path (overrides config)')
    .option('--json', 'Output as JSON')
    .action(async (options: InspectOptions) => {
      await inspect(options);
    });

  return cmd;
}

async function inspect(options: InspectOptions): Promise<void> {
  const { storage } = createRuntime(options);
  const limit = parseInt(options.limit, 10) || 10;

  await storage.initialize();
  try {
    const state = await storage.loadState(options.user);
    const recent = await storage.loadRecent(options.user, limit);

    if (options.json) {
      console.log(JSON.stringify({
        userId: options.user,
        state: state ? { version: state.version, bytes: state.payload.length } : null,
        recent,
      }, null, 2));
      return;
    }

    console.log();
    console.log(`  User: ${options.user}`);
    console.log('  ' + '─'.repeat(30));
    if (state) {
      console.log(`  Saved state: version ${state.version}, ${state.payload.length} bytes`);
    } else {
      console.log('  Saved state: none');
    }
    console.log();

    if (recent.length === 0) {
      console.log('  No stored interactions.\n');
      return;
    }

    console.log(`  Recent interactions (${recent.length}):`);
    for (const event of recent) {
      const when = new Date(event.timestamp).toISOString();
      const attrs = Object.entries(event.attributes).map(([k, v]) => `${k}=${v}`).join(' ');
      console.log(`    ${when}  ${event.type}${attrs ? `  ${attrs}` : ''}`);
    }
    console.log();
  } finally {
    await storage.release();
  }
}
