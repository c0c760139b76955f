import * as fs from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import { logger, type ILogger } from '../config/logger';
import { UnsupportedFormatError, errorMessage } from '../types/errors';
import type { LinkInfo, ResumeInput, TextExtractionResult } from '../types/match';

// Interfaces for better testability
export interface IFileSystem {
    readFileSync(path: string): Buffer;
}

export interface IPDFParser {
    (buffer: Buffer): Promise<{ text: string }>;
}

export interface ITextExtractor {
    extract(input: ResumeInput): Promise<TextExtractionResult>;
}

type ResumeFormat = 'pdf' | 'text';

const URL_PATTERN =
    /\b(?:https?:\/\/|www\.)[^\s<>"'()\[\]]+|\b(?:linkedin\.com|github\.com|gitlab\.com|medium\.com|behance\.net|dribbble\.com)\/[^\s<>"'()\[\]]+/gi;
const EMAIL_PATTERN = /\b[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}\b/gi;
const PHONE_PATTERN = /\b\d{10}\b/g;

/**
 * Text Extractor Service with Dependency Injection
 *
 * Reads a resume (PDF or plain text) into raw text and collects the links,
 * e-mail address and phone numbers found in it.
 */
export class TextExtractorService implements ITextExtractor {
    constructor(
        private fileSystem: IFileSystem,
        private pdfParser: IPDFParser,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): TextExtractorService {
        return new TextExtractorService(fs, pdf, logger);
    }

    async extract(input: ResumeInput): Promise<TextExtractionResult> {
        const { buffer, filename, mimetype } = this.load(input);
        const format = this.detectFormat(buffer, filename, mimetype);

        this.logger.info({
            filename,
            format,
            sizeBytes: buffer.length
        }, 'Extracting resume text');

        const text = normalizeWhitespace(
            format === 'pdf' ? await this.parsePDF(buffer) : buffer.toString('utf8')
        );

        if (text.length === 0) {
            throw new UnsupportedFormatError('Resume contains no extractable text');
        }

        const links = extractLinks(text);
        const result: TextExtractionResult = {
            raw_text: text,
            links,
            link_info: classifyLinks(text, links)
        };

        this.logger.info({
            filename,
            textLength: text.length,
            linksCount: links.length
        }, 'Resume text extracted');

        return result;
    }

    private load(input: ResumeInput): { buffer: Buffer; filename?: string; mimetype?: string } {
        if ('buffer' in input) {
            return input;
        }

        try {
            return {
                buffer: this.fileSystem.readFileSync(input.path),
                filename: path.basename(input.path)
            };
        } catch (error: unknown) {
            throw new UnsupportedFormatError(
                `Unable to read resume file ${input.path}: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }

    private detectFormat(buffer: Buffer, filename?: string, mimetype?: string): ResumeFormat {
        const extension = filename ? path.extname(filename).toLowerCase() : '';

        if (mimetype === 'application/pdf' || extension === '.pdf' || buffer.subarray(0, 5).toString('latin1') === '%PDF-') {
            return 'pdf';
        }
        if (mimetype === 'text/plain' || extension === '.txt') {
            return 'text';
        }

        throw new UnsupportedFormatError(
            `Unsupported resume format${filename ? ` for ${filename}` : ''}: expected PDF or plain text`
        );
    }

    private async parsePDF(buffer: Buffer): Promise<string> {
        try {
            const pdfData = await this.pdfParser(buffer);
            return pdfData.text;
        } catch (error: unknown) {
            this.logger.error({ err: error }, 'Failed to parse PDF');
            throw new UnsupportedFormatError(`PDF parsing failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}

export function normalizeWhitespace(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .replace(/[ \t\f\v]+/g, ' ')
        .replace(/ *\n */g, '\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function extractLinks(text: string): string[] {
    const found = new Set<string>();

    for (const match of text.matchAll(URL_PATTERN)) {
        found.add(match[0].replace(/[.,;:]+$/, ''));
    }

    return [...found];
}

/**
 * Sorts links into profile fields; anything that is not a known profile
 * link counts as a project link.
 */
export function classifyLinks(text: string, links: readonly string[]): LinkInfo {
    const info: LinkInfo = {
        email: text.match(EMAIL_PATTERN)?.[0] ?? '',
        phones: [...new Set(text.match(PHONE_PATTERN) ?? [])],
        linkedin: '',
        medium: '',
        projects: []
    };

    for (const link of links) {
        const lower = link.toLowerCase();
        if (lower.includes('linkedin.com')) {
            info.linkedin = info.linkedin || link;
        } else if (lower.includes('medium.com')) {
            info.medium = info.medium || link;
        } else {
            info.projects.push(link);
        }
    }

    return info;
}

// Singleton instance
let textExtractorService: TextExtractorService | null = null;

export function getTextExtractorService(): TextExtractorService {
    if (!textExtractorService) {
        textExtractorService = TextExtractorService.create();
    }
    return textExtractorService;
}
