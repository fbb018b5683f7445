import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/workflow';

dotenv.config();

/**
 * Thresholds for the attendance flagger, the leave recommender and the
 * salary anomaly detector. Parsed once at startup; a bad value stops the
 * process instead of surfacing on the first request that needs it.
 */
export interface EngineConfig {
  attendanceWindowDays: number;
  absenceThreshold: number;
  lateThreshold: number;
  deviationSigma: number;
  baselineDays: number;
  minBaselineRecords: number;
  salaryDeviationPercent: number;
  deductionFraction: number;
  departmentCapacity: number;
  approvalLookbackDays: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  attendanceWindowDays: 30,
  absenceThreshold: 3,
  lateThreshold: 5,
  deviationSigma: 2,
  baselineDays: 180,
  minBaselineRecords: 10,
  salaryDeviationPercent: 25,
  deductionFraction: 0.4,
  departmentCapacity: 0.3,
  approvalLookbackDays: 365,
};

const engineConfigSchema = z.object({
  attendanceWindowDays: z.number().int().min(1).max(366),
  absenceThreshold: z.number().int().min(0),
  lateThreshold: z.number().int().min(0),
  deviationSigma: z.number().positive(),
  baselineDays: z.number().int().min(1),
  minBaselineRecords: z.number().int().min(1),
  salaryDeviationPercent: z.number().positive().max(100),
  deductionFraction: z.number().positive().max(1),
  departmentCapacity: z.number().positive().max(1),
  approvalLookbackDays: z.number().int().min(1),
});

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function buildEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return parseEngineConfig(overrides);
}

function parseEngineConfig(overrides: object): EngineConfig {
  const parsed = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid engine configuration: ${detail}`);
  }
  return parsed.data;
}

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  attendanceWindowDays: 'ATTENDANCE_WINDOW_DAYS',
  absenceThreshold: 'ATTENDANCE_ABSENCE_THRESHOLD',
  lateThreshold: 'ATTENDANCE_LATE_THRESHOLD',
  deviationSigma: 'ATTENDANCE_DEVIATION_SIGMA',
  baselineDays: 'ATTENDANCE_BASELINE_DAYS',
  minBaselineRecords: 'ATTENDANCE_MIN_BASELINE_RECORDS',
  salaryDeviationPercent: 'SALARY_DEVIATION_PERCENT',
  deductionFraction: 'SALARY_DEDUCTION_FRACTION',
  departmentCapacity: 'DEPARTMENT_CAPACITY_LIMIT',
  approvalLookbackDays: 'APPROVAL_LOOKBACK_DAYS',
};

/**
 * Read overrides from the environment. Unset or empty variables keep their
 * defaults; anything that is not a number is a configuration error.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const overrides: Record<string, number> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
    }
    overrides[key] = value;
  }
  return parseEngineConfig(overrides);
}
