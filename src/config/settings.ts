/**
 * Exception thresholds and cause code descriptions, loaded from JSON and
 * validated before the pipeline sees them
 */
import { z } from 'zod';
import { FileManager } from '../utils/fileManager.js';
import { SettingsError } from '../utils/errors.js';
import type { CauseCodeDescriptions, ExceptionSettings } from '../types/index.js';

// Settings files written by hand often quote their numbers
const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());
const count = numeric.pipe(z.number().int('must be a whole number').nonnegative());
const threshold = numeric.pipe(z.number().finite().nonnegative());
const causeCode = numeric.pipe(z.number().int('cause codes are integers').nonnegative());

export const exceptionSettingsSchema = z
  .object({
    cause_codes_excluded: z.array(causeCode),
    cause_code_amber_threshold: count,
    cause_code_red_threshold: count,
    mos_threshold: threshold,
    ccr_threshold: threshold,
    mos_amber_threshold: count,
    mos_red_threshold: count,
  })
  .refine((s) => s.cause_code_red_threshold >= s.cause_code_amber_threshold, {
    message: 'must not be below cause_code_amber_threshold',
    path: ['cause_code_red_threshold'],
  })
  .refine((s) => s.mos_red_threshold >= s.mos_amber_threshold, {
    message: 'must not be below mos_amber_threshold',
    path: ['mos_red_threshold'],
  });

export type RawExceptionSettings = z.input<typeof exceptionSettingsSchema>;

export const causeCodesSchema = z
  .record(z.string().regex(/^\d+$/, 'cause code keys are integers'), z.string())
  .refine((codes) => Object.keys(codes).length > 0, { message: 'no cause codes defined' });

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a parsed settings document
 */
export function parseExceptionSettings(data: unknown, source = 'settings'): ExceptionSettings {
  const result = exceptionSettingsSchema.safeParse(data);
  if (!result.success) {
    throw new SettingsError(source, describeIssues(result.error));
  }
  const s = result.data;
  return {
    excludedCauseCodes: new Set(s.cause_codes_excluded),
    causeAmberThreshold: s.cause_code_amber_threshold,
    causeRedThreshold: s.cause_code_red_threshold,
    mosThreshold: s.mos_threshold,
    ccrThreshold: s.ccr_threshold,
    mosAmberThreshold: s.mos_amber_threshold,
    mosRedThreshold: s.mos_red_threshold,
  };
}

export function parseCauseCodes(data: unknown, source = 'cause codes'): CauseCodeDescriptions {
  const result = causeCodesSchema.safeParse(data);
  if (!result.success) {
    throw new SettingsError(source, describeIssues(result.error));
  }
  return new Map(
    Object.entries(result.data).map(([code, description]) => [Number(code), description])
  );
}

async function readSettingsFile(filePath: string): Promise<unknown> {
  try {
    return await FileManager.readJSON(filePath);
  } catch (error) {
    const reason = error instanceof SyntaxError ? 'not valid JSON' : 'unable to open file';
    throw new SettingsError(filePath, [reason]);
  }
}

export async function loadExceptionSettings(filePath: string): Promise<ExceptionSettings> {
  return parseExceptionSettings(await readSettingsFile(filePath), filePath);
}

export async function loadCauseCodes(filePath: string): Promise<CauseCodeDescriptions> {
  return parseCauseCodes(await readSettingsFile(filePath), filePath);
}
