import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../src/app';
import { parseCandidateProfile } from '../../../src/schemas/candidate-profile.schema';
import { parseJobProfile, type JobProfile } from '../../../src/schemas/job-profile.schema';
import { SCORE_WEIGHTS } from '../../../src/scoring/score-combiner';
import {
    ExtractionError,
    GradingError,
    StructuringError,
    UnsupportedFormatError
} from '../../../src/types/errors';
import type { MatchReport, ResumeInput, TextExtractionResult } from '../../../src/types/match';

const mockPipeline = {
    run: vi.fn<(resumeInput: ResumeInput, jobDescription: string) => Promise<MatchReport>>(),
    structureJobDescription: vi.fn<(jobDescription: string) => Promise<JobProfile>>(),
    extractResumeText: vi.fn<(resumeInput: ResumeInput) => Promise<TextExtractionResult>>()
};

const JOB_PROFILE = parseJobProfile(globalThis.testUtils.generateMockJobResponse());

const REPORT: MatchReport = {
    candidate_profile: parseCandidateProfile(globalThis.testUtils.generateMockCandidateResponse()),
    job_profile: JOB_PROFILE,
    experience_breakdown: {
        total_years: 3,
        total_months: 36,
        years_by_employment_type: { 'full-time': 3 },
        contributions: [],
        excluded: [],
        has_overlaps: true,
        has_ambiguous_dates: false
    },
    skill_grade: { final_skill_match_score: 80 },
    scores: {
        experience_score: 60,
        education_score: 50,
        skill_score: 80,
        final_score: 73
    }
};

describe('HTTP routes', () => {
    let app: Express;

    beforeEach(() => {
        vi.resetAllMocks();
        app = createApp(mockPipeline, { maxUploadBytes: 1024 });
    });

    describe('System', () => {
        it('GET /health should report ok', async () => {
            const response = await request(app).get('/health');

            expect(response.status).toBe(200);
            expect(response.body.status).toBe('ok');
        });

        it('GET / should describe the API', async () => {
            const response = await request(app).get('/');

            expect(response.status).toBe(200);
            expect(response.body.message).toBe('Resume Match Service API');
            expect(response.body.scoring).toEqual({
                experience: SCORE_WEIGHTS.experience,
                education: SCORE_WEIGHTS.education,
                skills: SCORE_WEIGHTS.skill
            });
        });

        it('should allow cross-origin browser clients', async () => {
            const response = await request(app)
                .get('/health')
                .set('Origin', 'http://localhost:5173');

            expect(response.headers['access-control-allow-origin']).toBe('*');
        });

        it('should answer CORS preflight requests', async () => {
            const response = await request(app)
                .options('/match')
                .set('Origin', 'http://localhost:5173')
                .set('Access-Control-Request-Method', 'POST');

            expect(response.status).toBe(204);
            expect(response.headers['access-control-allow-methods']).toBe('GET,HEAD,PUT,PATCH,POST,DELETE');
        });
    });

    describe('POST /match', () => {
        it('should return the match report', async () => {
            mockPipeline.run.mockResolvedValue(REPORT);

            const response = await request(app)
                .post('/match')
                .field('job_description', 'Backend role')
                .attach('resume', Buffer.from('resume text'), 'jane.txt');

            expect(response.status).toBe(200);
            expect(response.body.scores).toEqual(REPORT.scores);
            expect(mockPipeline.run).toHaveBeenCalledWith(
                expect.objectContaining({ filename: 'jane.txt', buffer: Buffer.from('resume text') }),
                'Backend role'
            );
        });

        it('should require a job description', async () => {
            const response = await request(app)
                .post('/match')
                .attach('resume', Buffer.from('resume text'), 'jane.txt');

            expect(response.status).toBe(400);
            expect(response.body.error).toBe('Validation failed');
            expect(mockPipeline.run).not.toHaveBeenCalled();
        });

        it('should require a resume file', async () => {
            const response = await request(app)
                .post('/match')
                .field('job_description', 'Backend role');

            expect(response.status).toBe(400);
            expect(response.body.error).toBe('Resume file is required');
        });

        it('should reject oversized uploads', async () => {
            const response = await request(app)
                .post('/match')
                .field('job_description', 'Backend role')
                .attach('resume', Buffer.alloc(2048, 'a'), 'big.txt');

            expect(response.status).toBe(413);
            expect(response.body.code).toBe('LIMIT_FILE_SIZE');
        });

        it.each([
            [new UnsupportedFormatError('Unsupported resume format'), 415, 'UNSUPPORTED_FORMAT'],
            [new ExtractionError('Text extraction failed: disk'), 422, 'EXTRACTION_FAILED'],
            [new StructuringError('Candidate structuring failed after 2 attempts'), 502, 'STRUCTURING_FAILED'],
            [new GradingError('Skill grading failed: upstream'), 502, 'GRADING_FAILED'],
            [new Error('unexpected'), 500, 'INTERNAL_ERROR']
        ])('should map %s to HTTP %i', async (error, status, code) => {
            mockPipeline.run.mockRejectedValue(error);

            const response = await request(app)
                .post('/match')
                .field('job_description', 'Backend role')
                .attach('resume', Buffer.from('resume text'), 'jane.txt');

            expect(response.status).toBe(status);
            expect(response.body).toEqual({
                error: 'Resume match failed',
                code,
                message: error.message
            });
        });
    });

    describe('POST /match/batch', () => {
        it('should report each resume separately', async () => {
            mockPipeline.run
                .mockResolvedValueOnce(REPORT)
                .mockRejectedValueOnce(new UnsupportedFormatError('Unsupported resume format for b.docx: expected PDF or plain text'));

            const response = await request(app)
                .post('/match/batch')
                .field('job_description', 'Backend role')
                .attach('resumes', Buffer.from('first'), 'a.txt')
                .attach('resumes', Buffer.from('second'), 'b.docx');

            expect(response.status).toBe(200);
            expect(response.body.total_processed).toBe(2);
            expect(response.body.successful).toBe(1);
            expect(response.body.failed).toBe(1);
            expect(response.body.results[0]).toEqual(expect.objectContaining({
                filename: 'a.txt',
                success: true,
                scores: REPORT.scores
            }));
            expect(response.body.results[1]).toEqual({
                filename: 'b.docx',
                success: false,
                code: 'UNSUPPORTED_FORMAT',
                error: 'Unsupported resume format for b.docx: expected PDF or plain text'
            });
        });

        it('should require at least one resume', async () => {
            const response = await request(app)
                .post('/match/batch')
                .field('job_description', 'Backend role');

            expect(response.status).toBe(400);
            expect(response.body.error).toBe('At least one resume file is required');
        });
    });

    describe('POST /job-description/parse', () => {
        it('should return the structured job profile', async () => {
            mockPipeline.structureJobDescription.mockResolvedValue(JOB_PROFILE);

            const response = await request(app)
                .post('/job-description/parse')
                .send({ job_description: '  Backend role  ' });

            expect(response.status).toBe(200);
            expect(response.body.job_profile).toEqual(JOB_PROFILE);
            expect(mockPipeline.structureJobDescription).toHaveBeenCalledWith('Backend role');
        });

        it('should reject a blank job description', async () => {
            const response = await request(app)
                .post('/job-description/parse')
                .send({ job_description: '   ' });

            expect(response.status).toBe(400);
            expect(response.body.details[0].message).toBe('Job description is required');
        });
    });

    describe('POST /resume/extract', () => {
        it('should return extracted text and links', async () => {
            const extraction: TextExtractionResult = {
                raw_text: 'resume text',
                links: [],
                link_info: { email: '', phones: [], linkedin: '', medium: '', projects: [] }
            };
            mockPipeline.extractResumeText.mockResolvedValue(extraction);

            const response = await request(app)
                .post('/resume/extract')
                .attach('resume', Buffer.from('resume text'), 'jane.txt');

            expect(response.status).toBe(200);
            expect(response.body).toEqual(extraction);
        });
    });
});
