// Test environment; set before any module reads its configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.OPENAI_API_KEY = 'test-key';
process.env.LLM_MODEL = 'gpt-4o-mini';
process.env.LLM_TEMPERATURE = '0.1';
process.env.EXTERNAL_CALL_TIMEOUT_MS = '5000';

type RawProfile = Record<string, unknown>;

// Global test utilities
declare global {
    var testUtils: {
        generateMockCandidateResponse: (overrides?: RawProfile) => RawProfile;
        generateMockJobResponse: (overrides?: RawProfile) => RawProfile;
    };
}

globalThis.testUtils = {
    generateMockCandidateResponse: (overrides: RawProfile = {}) => ({
        name: 'Jane Placeholder',
        contact: {
            email: 'jane@example.com',
            phone: '',
            linkedin: '',
            github: '',
            portfolio: '',
            other_links: []
        },
        experience: [
            {
                title: 'Backend Engineer',
                company: 'Northwind',
                start_date: '2018',
                end_date: '2020',
                description: 'Built REST APIs in TypeScript',
                employment_type: 'full-time'
            },
            {
                title: 'Platform Engineer',
                company: 'Contoso',
                start_date: '2019',
                end_date: '2021',
                description: 'Ran PostgreSQL and Redis clusters',
                employment_type: 'full-time'
            }
        ],
        education: [
            {
                degree: 'B.Tech in Computer Science',
                degree_level: 'bachelor',
                field: 'Computer Science',
                institution: 'Example Institute of Technology',
                graduation_year: '2017'
            }
        ],
        skills: {
            technical: ['TypeScript', 'Node.js', 'PostgreSQL'],
            tools: ['Docker', 'Git'],
            soft: ['Communication']
        },
        projects: [
            {
                name: 'Queue Dashboard',
                description: 'Monitoring UI for background jobs',
                technologies: ['React', 'Redis']
            }
        ],
        certifications: [],
        links: [],
        ...overrides
    }),

    generateMockJobResponse: (overrides: RawProfile = {}) => ({
        title: 'Senior Backend Engineer',
        required_experience: { years: 5, domain: 'backend' },
        required_degree_level: 'master',
        required_fields: ['Computer Science'],
        required_skills: ['TypeScript', 'Node.js'],
        optional_skills: ['Kubernetes'],
        tools_and_technologies: ['Docker'],
        responsibilities: ['Design and operate APIs'],
        ...overrides
    })
};

export { };
