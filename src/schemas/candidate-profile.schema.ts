import { z } from 'zod';
import { formatIssues, listOf, looseString, objectOrEmpty, stringList } from './common';

export const workExperienceSchema = z.object({
    title: looseString,
    company: looseString,
    start_date: looseString,
    end_date: looseString,
    description: looseString,
    employment_type: looseString
});

export const educationSchema = z.object({
    degree: looseString,
    degree_level: looseString,
    field: looseString,
    institution: looseString,
    graduation_year: looseString
});

export const contactSchema = z.object({
    email: looseString,
    phone: looseString,
    linkedin: looseString,
    github: looseString,
    portfolio: looseString,
    other_links: stringList
});

export const candidateProjectSchema = z.object({
    name: looseString,
    description: looseString,
    technologies: stringList
});

/**
 * Candidate profile as returned by the structuring model
 */
export const candidateProfileSchema = z.object({
    name: looseString,
    contact: objectOrEmpty(contactSchema),
    experience: listOf(workExperienceSchema),
    education: listOf(educationSchema),
    skills: objectOrEmpty(z.object({
        technical: stringList,
        tools: stringList,
        soft: stringList
    })),
    projects: listOf(candidateProjectSchema),
    certifications: stringList,
    links: stringList
});

export type WorkExperience = z.infer<typeof workExperienceSchema>;
export type Education = z.infer<typeof educationSchema>;
export type CandidateContact = z.infer<typeof contactSchema>;
export type CandidateProject = z.infer<typeof candidateProjectSchema>;
export type CandidateProfile = z.infer<typeof candidateProfileSchema>;

export function parseCandidateProfile(raw: unknown): CandidateProfile {
    const result = candidateProfileSchema.safeParse(raw);
    if (!result.success) {
        throw new Error(`Candidate profile does not match schema: ${formatIssues(result.error)}`);
    }
    return result.data;
}
