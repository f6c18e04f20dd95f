/**
 * Environment configuration loader
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Load .env file from the project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const projectRoot = join(__dirname, '../..');
config({ path: join(projectRoot, '.env') });

export interface Config {
  settingsFile: string;
  causeCodesFile: string;
  outputDir: string;
  logLevel?: string;
}

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

export const env: Config = {
  settingsFile: getEnvVar('SETTINGS_FILE', join(projectRoot, 'config/exception_settings.json')),
  causeCodesFile: getEnvVar('CAUSE_CODES_FILE', join(projectRoot, 'config/termination_cause_codes.json')),
  outputDir: getEnvVar('OUTPUT_DIR', './output'),
  logLevel: process.env['LOG_LEVEL'],
};
