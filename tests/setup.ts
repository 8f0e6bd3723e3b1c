import 'reflect-metadata';

import { logger } from '@/utils/internal/logger.js';

// CLI commands reapply the configured level on every run.
process.env.PDB_MIRROR_LOG_LEVEL = 'crit';
logger.setLevel('crit');
