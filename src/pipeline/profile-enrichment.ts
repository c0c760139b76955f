import type { CandidateProfile } from '../schemas/candidate-profile.schema';
import type { TextExtractionResult } from '../types/match';

/**
 * Fills the candidate's contact block from what was found in the document
 * itself. Values read from the document win over the model's; the model's
 * value is kept where the document yielded nothing.
 */
export function enrichContactFromLinks(
    profile: CandidateProfile,
    extraction: TextExtractionResult
): CandidateProfile {
    const { link_info: info } = extraction;
    const [github, portfolio] = info.projects;

    return {
        ...profile,
        contact: {
            email: info.email || profile.contact.email,
            phone: info.phones[0] ?? profile.contact.phone,
            linkedin: info.linkedin || profile.contact.linkedin,
            github: github ?? profile.contact.github,
            portfolio: portfolio ?? profile.contact.portfolio,
            other_links: info.projects.length > 0 ? [...info.projects] : profile.contact.other_links
        },
        links: [...new Set([...profile.links, ...extraction.links])]
    };
}

export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
