import { z } from 'zod';
import { parseRequiredYears } from '../scoring/experience.evaluator';
import { formatIssues, looseString, objectOrEmpty, stringList } from './common';

export const requiredExperienceSchema = z.object({
    years: z
        .union([z.number(), z.string()])
        .nullish()
        .transform(value => parseRequiredYears(value)),
    domain: looseString
});

/**
 * Job profile as returned by the structuring model
 */
export const jobProfileSchema = z.object({
    title: looseString,
    required_experience: objectOrEmpty(requiredExperienceSchema),
    required_degree_level: looseString,
    required_fields: stringList,
    required_skills: stringList,
    optional_skills: stringList,
    tools_and_technologies: stringList,
    responsibilities: stringList
});

export type JobProfile = z.infer<typeof jobProfileSchema>;

export function parseJobProfile(raw: unknown): JobProfile {
    const result = jobProfileSchema.safeParse(raw);
    if (!result.success) {
        throw new Error(`Job profile does not match schema: ${formatIssues(result.error)}`);
    }
    return result.data;
}
