import { EngineConfig } from '../config/engine';
import { AttendanceAssessment, AttendanceProfile, AttendanceStatus, IsoDate } from '../types';
import { addDays, roundTo } from '../utils/helpers';

export interface AttendanceEntry {
  date: IsoDate;
  status: AttendanceStatus;
}

export type AttendanceFlagConfig = Pick<
  EngineConfig,
  'attendanceWindowDays' | 'absenceThreshold' | 'lateThreshold' | 'deviationSigma' | 'baselineDays' | 'minBaselineRecords'
>;

/** First day of the trailing window that ends on `date`. */
export function windowStart(date: IsoDate, config: Pick<EngineConfig, 'attendanceWindowDays'>): IsoDate {
  return addDays(date, -(config.attendanceWindowDays - 1));
}

/** First day of the history the flagger needs for a record on `date`. */
export function historyStart(date: IsoDate, config: AttendanceFlagConfig): IsoDate {
  return addDays(windowStart(date, config), -config.baselineDays);
}

function count(entries: AttendanceEntry[], status: AttendanceStatus): number {
  return entries.filter((e) => e.status === status).length;
}

/**
 * Flag a new attendance entry against the employee's own history.
 *
 * Rules, first match wins: absences in the window above the threshold, lates
 * in the window above the threshold, then (for an absence) a window absence
 * rate more than `deviationSigma` standard errors above the employee's
 * baseline rate from the period before the window.
 */
export function flagAttendance(
  current: AttendanceEntry,
  history: AttendanceEntry[],
  config: AttendanceFlagConfig
): AttendanceAssessment {
  const start = windowStart(current.date, config);
  const baselineFrom = addDays(start, -config.baselineDays);

  const others = history.filter((e) => e.date !== current.date);
  const window = [...others.filter((e) => e.date >= start && e.date < current.date), current];
  const baseline = others.filter((e) => e.date >= baselineFrom && e.date < start);

  const absences = count(window, 'absent');
  const lates = count(window, 'late');
  const absenceScore = Math.min(1, absences / (config.absenceThreshold + 1));
  const lateScore = Math.min(1, lates / (config.lateThreshold + 1));

  let deviationScore = 0;
  let deviates = false;
  if (current.status === 'absent' && baseline.length >= config.minBaselineRecords) {
    const baseRate = count(baseline, 'absent') / baseline.length;
    const windowRate = absences / window.length;
    const stdError = Math.sqrt((baseRate * (1 - baseRate)) / window.length);

    if (stdError === 0) {
      deviates = windowRate > baseRate;
      deviationScore = deviates ? 1 : 0;
    } else {
      const z = (windowRate - baseRate) / stdError;
      deviates = z > config.deviationSigma;
      deviationScore = Math.min(1, Math.max(0, z / (2 * config.deviationSigma)));
    }
  }

  const score = roundTo(Math.max(absenceScore, lateScore, deviationScore), 4);

  if (absences > config.absenceThreshold) {
    return { flagged: true, reason: 'excessive_absence', score };
  }
  if (lates > config.lateThreshold) {
    return { flagged: true, reason: 'excessive_lateness', score };
  }
  if (deviates) {
    return { flagged: true, reason: 'pattern_deviation', score };
  }
  return { flagged: false, reason: 'none', score };
}

/**
 * Coarse label shown on the employee dashboard and HR report.
 */
export function attendanceProfile(entries: AttendanceEntry[]): AttendanceProfile {
  const lates = count(entries, 'late');
  const absences = count(entries, 'absent');

  if (lates > 4) return 'frequently_late';
  if (absences >= 3 && lates >= 3) return 'irregular';
  return 'stable';
}
