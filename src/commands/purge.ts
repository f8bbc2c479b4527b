import { Command } from 'commander';
import { getReader } from '../services/reader.js';
import { logger } from '../utils/logger.js';
import { parsePositiveInt, printJson, reportError, type JsonOption } from './shared.js';

interface PurgeOptions extends JsonOption {
  days?: string;
}

export function createPurgeCommand(): Command {
  return new Command('purge')
    .description(`Remove articles no feed has listed within the retention period.

Starred articles are kept unless they were deleted. The period defaults to
the retention_days setting (7 days).`)
    .option('-d, --days <n>', 'Retention period in days')
    .option('--json', 'Output as JSON')
    .action((options: PurgeOptions) => {
      try {
        const { presenter } = getReader();
        const days = options.days ? parsePositiveInt(options.days, 'days') : undefined;
        const purged = presenter.purge(new Date(), days);

        if (options.json) {
          printJson({ purged });
        } else {
          logger.success(`Purged ${purged} article(s)`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}
