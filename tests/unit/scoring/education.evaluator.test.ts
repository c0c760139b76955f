import { describe, it, expect } from 'vitest';
import type { Education } from '../../../src/schemas/candidate-profile.schema';
import {
    DEGREE_LEVELS,
    EDUCATION_POLICY,
    canonicalFields,
    degreeMatch,
    fieldMatches,
    normalizeDegreeLevel,
    normalizeRequiredDegreeLevel
} from '../../../src/scoring/education.evaluator';

function education(degree_level: string, field: string, degree: string = ''): Education {
    return {
        degree,
        degree_level,
        field,
        institution: 'Example University',
        graduation_year: '2017'
    };
}

describe('Education Evaluator', () => {
    describe('normalizeDegreeLevel', () => {
        it.each([
            ['Ph.D', 'doctorate'],
            ['Doctor of Philosophy', 'doctorate'],
            ['M.Sc. Physics', 'master'],
            ['MBA', 'master'],
            ['B.Tech', 'bachelor'],
            ["Bachelor's in Commerce", 'bachelor'],
            ['Diploma in Electronics', 'associate'],
            ['High school', 'none'],
            ['', 'none'],
            ['B.E.', 'bachelor'],
            ['BS Computer Science', 'bachelor'],
            ['MS', 'master'],
            ['ma', 'master'],
            ['Bachelor + Master', 'master']
        ])('should read "%s" as %s', (raw, expected) => {
            expect(normalizeDegreeLevel(raw)).toBe(expected);
        });

        it('should not read ordinary words as two-letter degrees', () => {
            expect(normalizeDegreeLevel('Degree will be a plus')).toBe('none');
            expect(normalizeDegreeLevel('ms office and be a team player')).toBe('none');
        });
    });

    describe('normalizeRequiredDegreeLevel', () => {
        it.each([
            ["Bachelor's or Master's degree", 'bachelor'],
            ['Master or PhD', 'master'],
            ['Diploma, M.S. University', 'associate'],
            ['Degree will be a plus', 'none'],
            ['M.S.', 'master'],
            ['', 'none']
        ])('should read the requirement "%s" as %s', (raw, expected) => {
            expect(normalizeRequiredDegreeLevel(raw)).toBe(expected);
        });
    });

    describe('fieldMatches', () => {
        it('should match field abbreviations against full names', () => {
            expect(fieldMatches('CSE', ['Computer Science'])).toBe(true);
            expect(fieldMatches('AI & ML', ['Data Science'])).toBe(true);
        });

        it('should not match unrelated fields', () => {
            expect(fieldMatches('Mechanical Engineering', ['Computer Science'])).toBe(false);
        });

        it('should accept any field when none is required', () => {
            expect(fieldMatches('History', [])).toBe(true);
        });

        it('should fall back to the literal field for unknown names', () => {
            expect([...canonicalFields('Marine Biology')]).toEqual(['marine biology']);
        });
    });

    describe('degreeMatch', () => {
        it('should accept the lower alternative of an "or" requirement', () => {
            expect(degreeMatch(
                [education('bachelor', 'Computer Science')],
                "Bachelor's or Master's degree",
                ['Computer Science']
            )).toBe(100);
        });

        it('should treat a requirement without a recognisable degree as met', () => {
            expect(degreeMatch([education('associate', 'History')], 'Degree will be a plus', [])).toBe(100);
        });

        it('should give half credit one level below with a matching field', () => {
            expect(degreeMatch([education('bachelor', 'Computer Science')], 'master', ['Computer Science'])).toBe(50);
        });

        it('should cap a field mismatch at the ceiling', () => {
            expect(degreeMatch([education('master', 'Mechanical Engineering')], 'master', ['Computer Science']))
                .toBe(EDUCATION_POLICY.fieldMismatchCeiling);
        });

        it('should give no credit two levels below', () => {
            expect(degreeMatch([education('associate', 'Computer Science')], 'master', ['Computer Science'])).toBe(0);
        });

        it('should give full credit above the required level', () => {
            expect(degreeMatch([education('doctorate', 'Computer Science')], 'master', ['Computer Science'])).toBe(100);
        });

        it('should score 0 without any education', () => {
            expect(degreeMatch([], 'bachelor', [])).toBe(0);
        });

        it('should treat a blank required level as met', () => {
            expect(degreeMatch([education('', 'History')], '', [])).toBe(100);
        });

        it('should use the best entry', () => {
            const entries = [
                education('associate', 'Mechanical Engineering'),
                education('master', 'Computer Science')
            ];

            expect(degreeMatch(entries, 'master', ['Computer Science'])).toBe(100);
        });

        it('should read level and field from the degree text when they are blank', () => {
            expect(degreeMatch([education('', '', 'B.Tech CSE')], 'bachelor', ['Computer Science'])).toBe(100);
        });

        it('should never score a higher degree below a lower one', () => {
            for (const required of DEGREE_LEVELS) {
                const scores = DEGREE_LEVELS.map(level =>
                    degreeMatch([education(level, 'Computer Science')], required, ['Computer Science'])
                );
                const sorted = [...scores].sort((a, b) => a - b);

                expect(scores).toEqual(sorted);
            }
        });
    });
});
