import { z } from 'zod';

export interface ChartingConfig {
  logDroppedPoints: boolean; // warn once per row dropped while loading a charting file
  strictSecondCode: boolean; // a second-serve code on a point whose first serve went in is an error
  debug: boolean;
}

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
    .optional()
    .transform((value) => value ?? fallback);

const envSchema = z.object({
  CHARTING_LOG_DROPPED: flag(true),
  CHARTING_STRICT_SECOND_CODE: flag(true),
  CHARTING_DEBUG: flag(false),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): ChartingConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid charting configuration: ${issues.join('; ')}`);
  }

  return {
    logDroppedPoints: parsed.data.CHARTING_LOG_DROPPED,
    strictSecondCode: parsed.data.CHARTING_STRICT_SECOND_CODE,
    debug: parsed.data.CHARTING_DEBUG,
  };
}
