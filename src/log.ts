import { type Logger, pino } from 'pino';
import { PrettyTransform } from 'pretty-json-log';

export type { Logger };

export const logger: Logger = process.stdout.isTTY ? pino(PrettyTransform.stream()) : pino();

logger.level = process.argv.includes('--verbose') ? 'trace' : 'info';
