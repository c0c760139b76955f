import fieldSynonyms from '../data/field-synonyms.json';
import type { Education } from '../schemas/candidate-profile.schema';

export const DEGREE_LEVELS = ['none', 'associate', 'bachelor', 'master', 'doctorate'] as const;

export type DegreeLevel = typeof DEGREE_LEVELS[number];

/**
 * Partial-credit policy. Changing how education is rewarded means changing
 * these numbers only.
 */
export const EDUCATION_POLICY = {
    levelMet: 100,
    oneLevelBelow: 50,
    twoOrMoreBelow: 0,
    fieldMismatchCeiling: 70
} as const;

const DEGREE_PATTERNS: ReadonlyArray<readonly [DegreeLevel, RegExp]> = [
    ['doctorate', /\b(phd|dphil|doctorate|doctoral|doctor)\b/],
    ['master', /\b(masters?|postgraduate|post graduate|m ?tech|m ?sc|m ?eng|m ?phil|mba|mca|pg)\b/],
    ['bachelor', /\b(bachelors?|undergraduate|b ?tech|b ?sc|b ?eng|b ?com|bba|bca)\b/],
    ['associate', /\b(associates?|diploma|aas)\b/]
];

// Two-letter degrees (BS, M.E., B.A.) are also ordinary words once lowercased,
// so they only count when dotted, upper-case, or the whole value
const DOTTED_ABBREVIATION = /\b([BbMm])\.\s?[SEAsea]\.?(?![A-Za-z])/g;
const UPPER_ABBREVIATION = /\b([BM])[SEA]\b/g;
const WHOLE_ABBREVIATION = /^([bm]) ?[sea]$/;

function abbreviationLevel(letter: string): DegreeLevel {
    return letter.toLowerCase() === 'b' ? 'bachelor' : 'master';
}

/**
 * Every level a free-text degree mentions, e.g. "B.Tech", "M.Sc. Physics",
 * "Ph.D" or "Bachelor's or Master's degree".
 */
function mentionedDegreeLevels(raw: string): Set<DegreeLevel> {
    const found = new Set<DegreeLevel>();
    const text = raw
        .toLowerCase()
        .replace(/[.'’]/g, '')
        .replace(/[^a-z0-9]+/g, ' ')
        .trim();

    if (text === '') {
        return found;
    }

    for (const [level, pattern] of DEGREE_PATTERNS) {
        if (pattern.test(text)) {
            found.add(level);
        }
    }

    for (const pattern of [DOTTED_ABBREVIATION, UPPER_ABBREVIATION]) {
        for (const match of raw.matchAll(pattern)) {
            found.add(abbreviationLevel(match[1]));
        }
    }

    const whole = WHOLE_ABBREVIATION.exec(text);
    if (whole) {
        found.add(abbreviationLevel(whole[1]));
    }

    return found;
}

/**
 * Maps a candidate's degree onto the ordinal scale. When several levels
 * are mentioned ("Bachelor + Master") the highest one counts.
 * Unrecognised text is `none`.
 */
export function normalizeDegreeLevel(raw: string): DegreeLevel {
    const found = mentionedDegreeLevels(raw);
    return DEGREE_LEVELS.reduce<DegreeLevel>((best, level) => (found.has(level) ? level : best), 'none');
}

/**
 * Maps a job's degree requirement onto the ordinal scale. Requirements
 * list alternatives ("Bachelor's or Master's"), so the lowest level
 * mentioned counts.
 */
export function normalizeRequiredDegreeLevel(raw: string): DegreeLevel {
    const found = mentionedDegreeLevels(raw);
    return DEGREE_LEVELS.find(level => found.has(level)) ?? 'none';
}

export function degreeRank(level: DegreeLevel): number {
    return DEGREE_LEVELS.indexOf(level);
}

function normalizeField(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/&/g, ' and ')
        .replace(/[^a-z0-9]+/g, ' ')
        .trim();
}

/**
 * Canonical field names mentioned in a free-text field. Text that mentions
 * no known field is its own canonical name.
 */
export function canonicalFields(raw: string): Set<string> {
    const normalized = normalizeField(raw);
    const found = new Set<string>();

    if (normalized === '') {
        return found;
    }

    const padded = ` ${normalized} `;
    for (const group of fieldSynonyms) {
        if (group.aliases.some(alias => padded.includes(` ${alias} `))) {
            found.add(group.field);
        }
    }

    if (found.size === 0) {
        found.add(normalized);
    }

    return found;
}

export function fieldMatches(candidateField: string, requiredFields: readonly string[]): boolean {
    if (requiredFields.length === 0) {
        return true;
    }

    const candidate = canonicalFields(candidateField);
    return requiredFields.some(required => {
        for (const field of canonicalFields(required)) {
            if (candidate.has(field)) {
                return true;
            }
        }
        return false;
    });
}

function levelScore(candidateRank: number, requiredRank: number): number {
    const gap = requiredRank - candidateRank;
    if (gap <= 0) {
        return EDUCATION_POLICY.levelMet;
    }
    return gap === 1 ? EDUCATION_POLICY.oneLevelBelow : EDUCATION_POLICY.twoOrMoreBelow;
}

function scoreEntry(entry: Education, requiredRank: number, requiredFields: readonly string[]): number {
    const level = normalizeDegreeLevel(entry.degree_level || entry.degree);
    const score = levelScore(degreeRank(level), requiredRank);

    // The field is often folded into the degree text ("B.Tech CSE")
    const field = entry.field || entry.degree;
    if (!fieldMatches(field, requiredFields)) {
        return Math.min(score, EDUCATION_POLICY.fieldMismatchCeiling);
    }

    return score;
}

/**
 * Education match, 0-100: the best-scoring education entry wins.
 * A blank required level is always satisfied; no education at all scores 0.
 */
export function degreeMatch(
    education: readonly Education[],
    requiredDegreeLevel: string,
    requiredFields: readonly string[]
): number {
    if (education.length === 0) {
        return 0;
    }

    const requiredRank = degreeRank(normalizeRequiredDegreeLevel(requiredDegreeLevel));
    const fields = requiredFields.map(field => field.trim()).filter(field => field.length > 0);

    return Math.max(...education.map(entry => scoreEntry(entry, requiredRank, fields)));
}
