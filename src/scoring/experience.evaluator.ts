import { AmbiguousDateError, errorMessage } from '../types/errors';
import type { WorkExperience } from '../schemas/candidate-profile.schema';
import type {
    ExcludedExperience,
    ExperienceBreakdown,
    ExperienceContribution
} from '../types/match';

/** Half-open range of month indices, `year * 12 + (month - 1)` */
interface MonthInterval {
    start: number;
    end: number;
}

type ParsedDate =
    | { kind: 'present' }
    | { kind: 'year'; year: number }
    | { kind: 'month'; year: number; month: number };

const PRESENT_TOKENS = new Set([
    'present',
    'current',
    'currently',
    'now',
    'ongoing',
    'till date',
    'till now',
    'to date',
    'today'
]);

const MONTH_NAMES = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december'
];

const MIN_YEAR = 1900;

function toMonthIndex(year: number, month: number): number {
    return year * 12 + (month - 1);
}

function formatMonthIndex(index: number): string {
    const year = Math.floor(index / 12);
    const month = (index % 12) + 1;
    return `${year}-${String(month).padStart(2, '0')}`;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

function monthFromName(token: string): number | null {
    if (token.length < 3) {
        return null;
    }
    const position = MONTH_NAMES.findIndex(name => name.startsWith(token));
    return position === -1 ? null : position + 1;
}

/**
 * Reads one resume date. Returns null when the text is not a date we
 * understand; range checks happen in the caller.
 */
function parseResumeDate(raw: string): ParsedDate | null {
    const text = raw
        .trim()
        .toLowerCase()
        .replace(/[.,]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();

    if (PRESENT_TOKENS.has(text)) {
        return { kind: 'present' };
    }

    let match = /^(\d{4})$/.exec(text);
    if (match) {
        return { kind: 'year', year: Number(match[1]) };
    }

    // 2019-03, 2019/03, 2019-03-15
    match = /^(\d{4})[-/](\d{1,2})(?:[-/]\d{1,2})?$/.exec(text);
    if (match) {
        return { kind: 'month', year: Number(match[1]), month: Number(match[2]) };
    }

    // 03/2019, 3-2019
    match = /^(\d{1,2})[-/](\d{4})$/.exec(text);
    if (match) {
        return { kind: 'month', year: Number(match[2]), month: Number(match[1]) };
    }

    // mar 2019, march 2019
    match = /^([a-z]+) (\d{4})$/.exec(text);
    if (match) {
        const month = monthFromName(match[1]);
        return month === null ? null : { kind: 'month', year: Number(match[2]), month };
    }

    return null;
}

function readDate(
    raw: string,
    field: 'start_date' | 'end_date',
    entryIndex: number,
    maxYear: number
): ParsedDate {
    if (raw.trim() === '') {
        throw new AmbiguousDateError(`Entry ${entryIndex} has no ${field}`, entryIndex, raw);
    }

    const parsed = parseResumeDate(raw);
    if (parsed === null) {
        throw new AmbiguousDateError(`Entry ${entryIndex} has unreadable ${field} "${raw}"`, entryIndex, raw);
    }

    if (parsed.kind === 'present') {
        return parsed;
    }

    if (parsed.year < MIN_YEAR || parsed.year > maxYear) {
        throw new AmbiguousDateError(`Entry ${entryIndex} has out-of-range ${field} "${raw}"`, entryIndex, raw);
    }
    if (parsed.kind === 'month' && (parsed.month < 1 || parsed.month > 12)) {
        throw new AmbiguousDateError(`Entry ${entryIndex} has invalid month in ${field} "${raw}"`, entryIndex, raw);
    }

    return parsed;
}

/**
 * Turns a work entry into a month interval. Starts are inclusive (a bare
 * year means January); ends are exclusive. A bare end year means January
 * of that year, or January of the next year when the entry starts in that
 * same year. A month end means the month after it, and "present" means
 * the month after the evaluation month.
 */
function toInterval(entry: WorkExperience, entryIndex: number, evaluationIndex: number): MonthInterval {
    const maxYear = Math.floor(evaluationIndex / 12) + 1;
    const start = readDate(entry.start_date, 'start_date', entryIndex, maxYear);
    const end = readDate(entry.end_date, 'end_date', entryIndex, maxYear);

    if (start.kind === 'present') {
        throw new AmbiguousDateError(`Entry ${entryIndex} starts at "${entry.start_date}"`, entryIndex, entry.start_date);
    }

    const startIndex = toMonthIndex(start.year, start.kind === 'month' ? start.month : 1);
    let endIndex: number;
    if (end.kind === 'present') {
        endIndex = evaluationIndex + 1;
    } else if (end.kind === 'month') {
        endIndex = toMonthIndex(end.year, end.month) + 1;
    } else if (end.year === start.year) {
        endIndex = toMonthIndex(end.year + 1, 1);
    } else {
        endIndex = toMonthIndex(end.year, 1);
    }

    if (endIndex < startIndex) {
        throw new AmbiguousDateError(
            `Entry ${entryIndex} ends (${entry.end_date}) before it starts (${entry.start_date})`,
            entryIndex,
            entry.end_date
        );
    }

    return { start: startIndex, end: endIndex };
}

/**
 * Interval union. Touching intervals are merged too.
 */
export function mergeIntervals(intervals: readonly MonthInterval[]): MonthInterval[] {
    const sorted = [...intervals].sort((a, b) => a.start - b.start || a.end - b.end);
    const merged: MonthInterval[] = [];

    for (const current of sorted) {
        const last = merged[merged.length - 1];
        if (!last || current.start > last.end) {
            merged.push({ start: current.start, end: current.end });
            continue;
        }
        last.end = Math.max(last.end, current.end);
    }

    return merged;
}

function unionMonths(intervals: readonly MonthInterval[]): number {
    return mergeIntervals(intervals).reduce((sum, interval) => sum + (interval.end - interval.start), 0);
}

function employmentTypeKey(raw: string): string {
    const key = raw.trim().toLowerCase();
    return key === '' ? 'unspecified' : key;
}

function hasOverlap(intervals: readonly MonthInterval[]): boolean {
    const sorted = [...intervals].sort((a, b) => a.start - b.start);
    let furthestEnd = -Infinity;

    for (const interval of sorted) {
        if (interval.start < furthestEnd) {
            return true;
        }
        furthestEnd = Math.max(furthestEnd, interval.end);
    }

    return false;
}

/**
 * Computes total experience as the union of all dated work entries.
 *
 * Entries with unreadable or inverted dates are excluded and flagged
 * rather than failing the whole breakdown. The result does not depend on
 * the order of `entries`.
 */
export function computeExperienceBreakdown(
    entries: readonly WorkExperience[],
    evaluationDate: Date = new Date()
): ExperienceBreakdown {
    const evaluationIndex = toMonthIndex(evaluationDate.getUTCFullYear(), evaluationDate.getUTCMonth() + 1);
    const intervals: MonthInterval[] = [];
    const intervalsByType = new Map<string, MonthInterval[]>();
    const contributions: ExperienceContribution[] = [];
    const excluded: ExcludedExperience[] = [];

    entries.forEach((entry, index) => {
        try {
            const interval = toInterval(entry, index, evaluationIndex);
            intervals.push(interval);
            const typeKey = employmentTypeKey(entry.employment_type);
            intervalsByType.set(typeKey, [...(intervalsByType.get(typeKey) ?? []), interval]);
            contributions.push({
                index,
                title: entry.title,
                company: entry.company,
                employment_type: entry.employment_type,
                start: formatMonthIndex(interval.start),
                end: formatMonthIndex(interval.end),
                months: interval.end - interval.start
            });
        } catch (error: unknown) {
            if (!(error instanceof AmbiguousDateError)) {
                throw error;
            }
            excluded.push({
                index,
                title: entry.title,
                company: entry.company,
                reason: errorMessage(error)
            });
        }
    });

    const totalMonths = unionMonths(intervals);
    const yearsByType: Record<string, number> = {};
    for (const [typeKey, typeIntervals] of intervalsByType) {
        yearsByType[typeKey] = round2(unionMonths(typeIntervals) / 12);
    }

    return {
        total_years: round2(totalMonths / 12),
        total_months: totalMonths,
        years_by_employment_type: yearsByType,
        contributions,
        excluded,
        has_overlaps: hasOverlap(intervals),
        has_ambiguous_dates: excluded.length > 0
    };
}

/**
 * Share of the required experience the candidate covers, 0-100.
 * A job without a (positive) requirement is always fully satisfied.
 */
export function experienceMatch(
    breakdown: Pick<ExperienceBreakdown, 'total_years'>,
    requiredYears: number
): number {
    if (!Number.isFinite(requiredYears) || requiredYears <= 0) {
        return 100;
    }

    const ratio = Math.min(Math.max(breakdown.total_years, 0) / requiredYears, 1);
    return ratio * 100;
}

/**
 * Reads the required years out of whatever the job structuring step produced:
 * a number, or text such as "3+ years" / "3-5 years" (first number wins).
 */
export function parseRequiredYears(value: unknown): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.max(value, 0) : 0;
    }

    if (typeof value === 'string') {
        const match = /\d+(?:\.\d+)?/.exec(value);
        return match ? Number(match[0]) : 0;
    }

    return 0;
}
