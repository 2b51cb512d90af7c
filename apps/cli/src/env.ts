/**
 * Loads .env from the working directory. Imported before anything else so
 * LOG_LEVEL and TEMPO_* values are visible to the logger and config.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });
