import { runIndex } from '@/lib/commands';
import { ConfigError } from '@/lib/errors';
import { log } from '@/lib/logger';

runIndex(process.argv.slice(2), line => process.stdout.write(`${line}\n`)).catch((error: unknown) => {
  process.exitCode = 1;
  // the logger takes its level from the same configuration
  if (error instanceof ConfigError) {
    process.stderr.write(`${error.message}\n`);
    return;
  }
  log.error(error instanceof Error ? error.message : String(error), {
    error: error instanceof Error ? error.name : typeof error,
  });
});
