import 'dotenv/config';

import { createAuthRuntime } from '../runtime.js';

async function run(): Promise<void> {
  const runtime = createAuthRuntime();

  try {
    const purged = await runtime.accountService.cleanExpiredBlacklistedTokens();
    runtime.logger.info({ purged }, 'Blacklist cleanup complete.');
  } finally {
    await runtime.close();
  }
}

void run().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
