import { logger, LogLevel } from '../utils/logger.js';

logger.setLevel(LogLevel.SILENT);
