/**
 * Vitest setup file
 * Keeps pipeline logging quiet: only errors reach stderr during tests
 */

import { logger } from '../src/utils/logger.js';

logger.setLevel('error');
