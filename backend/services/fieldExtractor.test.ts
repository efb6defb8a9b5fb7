import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG, defineCatalog } from '../config/extractionCatalog';
import { createDefaultFields, DEFAULT_FULLNAME, DEFAULT_SUMMARY, RESUME_FIELDS } from '../types/resume';
import {
    detectName,
    detectPhone,
    detectSoftSkills,
    extractResumeFields,
    FieldExtractor,
    inferTitleFromSkills,
    splitLines,
    splitSkillTokens
} from './fieldExtractor';

const JANE_DOE = [
    'Jane Doe',
    'jane.doe@example.com',
    '+91 9876543210',
    'Bangalore, India',
    'SUMMARY',
    'Experienced backend engineer with 5 years building distributed systems.',
    'SKILLS',
    'Python, Go, SQL, Docker',
    'EXPERIENCE',
    'Backend Engineer at Foo Corp 2019-2024',
    'Built payment systems.'
].join('\n');

describe('extractResumeFields', () => {
    it('returns the defaults for empty or whitespace-only text', () => {
        expect(extractResumeFields('')).toEqual(createDefaultFields());
        expect(extractResumeFields('   \n\t \r\n ')).toEqual(createDefaultFields());
    });

    it('always returns every field as a string', () => {
        const result = extractResumeFields(JANE_DOE);

        expect(Object.keys(result).sort()).toEqual([...RESUME_FIELDS].sort());
        for (const field of RESUME_FIELDS) {
            expect(typeof result[field]).toBe('string');
        }
    });

    it('extracts contact details and sections from a simple resume', () => {
        const result = extractResumeFields(JANE_DOE);

        expect(result.fullname).toBe('Jane Doe');
        expect(result.email).toBe('jane.doe@example.com');
        expect(result.phone).toBe('+91 9876543210');
        expect(result.location).toBe('Bangalore, India');
        expect(result.summary).toBe('Experienced backend engineer with 5 years building distributed systems.');
        expect(result.career_objective).toBe('');
        // 两个字符的技能会被过滤掉
        expect(result.skills).toBe('Python, SQL, Docker');
        expect(result.experience).toBe('Backend Engineer at Foo Corp 2019-2024\nBuilt payment systems.');
        expect(result.education).toBe('');
        expect(result.title).toBe('Experienced backend engineer with 5 years building distributed systems.');
        expect(result.projects).toBe('');
        expect(result.linkedin).toBe('');
        expect(result.website).toBe('');
    });

    it('falls back to the lines after an experience mention when there is no header', () => {
        const result = extractResumeFields([
            'John Smith',
            '5 years experience in logistics',
            'Managed warehouse operations across three sites.',
            'Coordinated shipping schedules with vendors.'
        ].join('\n'));

        expect(result.experience).toBe(
            'Managed warehouse operations across three sites.\nCoordinated shipping schedules with vendors.'
        );
        expect(result.summary).toBe(DEFAULT_SUMMARY);
        expect(result.title).toBe('Professional');
    });

    it('collects degree lines when there is no education header', () => {
        const result = extractResumeFields([
            'Asha Patel',
            'Bachelor of Science in Physics, 2015',
            'Master of Data Science, 2018'
        ].join('\n'));

        expect(result.education).toBe('Bachelor of Science in Physics, 2015\nMaster of Data Science, 2018');
    });

    it('copies the summary into career_objective when a career objective header exists', () => {
        const result = extractResumeFields('CAREER OBJECTIVE\nSeeking a backend role in fintech companies.');

        expect(result.summary).toBe('Seeking a backend role in fintech companies.');
        expect(result.career_objective).toBe('Seeking a backend role in fintech companies.');
    });

    it('prefixes profile links without a scheme', () => {
        const result = extractResumeFields('Jane Doe\ngithub.com/janedoe\nlinkedin.com/in/jane-doe');

        expect(result.github).toBe('https://github.com/janedoe');
        expect(result.linkedin).toBe('https://linkedin.com/in/jane-doe');
        expect(result.website).toBe('');
    });

    it('detects a personal website but not profile hosts', () => {
        const result = extractResumeFields('Jane Doe\nhttps://github.com/janedoe\nPortfolio: https://janedoe.dev');

        expect(result.github).toBe('https://github.com/janedoe');
        expect(result.website).toBe('https://janedoe.dev');
    });

    it('reads labelled date of birth and nationality', () => {
        const result = extractResumeFields('Jane Doe\nDate of Birth: 12/05/1995\nNationality: Indian');

        expect(result.dob).toBe('1995-05-12');
        expect(result.nationality).toBe('Indian');
    });

    it('caps the summary at 1000 characters', () => {
        const body = Array.from({ length: 12 }, () => 'x'.repeat(150));
        const result = extractResumeFields(['SUMMARY', ...body].join('\n'));

        expect(result.summary).toHaveLength(1000);
        expect(result.fullname).toBe(DEFAULT_FULLNAME);
    });

    it('handles the blank-line layout of a typical pasted resume', () => {
        const result = extractResumeFields(
            'Jane Doe\njane.doe@email.com\n+91 9876543210\nBangalore, India\n\nSUMMARY\n'
            + 'Experienced backend engineer with 5 years building APIs.\n\nSKILLS\nPython, Go, SQL, Docker\n\n'
            + 'EXPERIENCE\nBackend Engineer at Foo Corp 2019-2024\nBuilt payment systems.'
        );

        expect(result.fullname).toBe('Jane Doe');
        expect(result.email).toBe('jane.doe@email.com');
        expect(result.phone).toBe('+91 9876543210');
        expect(result.location).toBe('Bangalore, India');
        expect(result.summary).toBe('Experienced backend engineer with 5 years building APIs.');
        expect(result.skills).toBe('Python, SQL, Docker');
        expect(result.experience).toBe('Backend Engineer at Foo Corp 2019-2024\nBuilt payment systems.');
    });

    it('never lets a section run into the header right below it', () => {
        const result = extractResumeFields([
            'Jane Doe',
            'SKILLS',
            'EXPERIENCE',
            'Backend Engineer at Foo Corp 2019-2024',
            'EDUCATION',
            'B.Tech Computer Science 2018'
        ].join('\n'));

        expect(result.skills).toBe('');
        expect(result.experience).toBe('Backend Engineer at Foo Corp 2019-2024');
        expect(result.education).toBe('B.Tech Computer Science 2018');
    });

    it('caps every section at its character limit', () => {
        const block = (letter: string, count: number): string[] =>
            Array.from({ length: count }, () => letter.repeat(100));
        const bold = '\u{1D400}';

        const result = extractResumeFields([
            'Jane Doe',
            'SKILLS',
            ...Array.from({ length: 20 }, () => Array.from({ length: 4 }, () => 'k'.repeat(60)).join(', ')),
            'EXPERIENCE',
            ...block('e', 30),
            'EDUCATION',
            ...block('d', 20),
            'PROJECTS',
            ...block('p', 30),
            'CERTIFICATIONS',
            ...block('c', 15),
            'LANGUAGES',
            ...block('l', 5),
            'AWARDS',
            ...block(bold, 15)
        ].join('\n'));

        const codePoints = (value: string): number => Array.from(value).length;
        expect(codePoints(result.skills)).toBe(500);
        expect(codePoints(result.experience)).toBe(1500);
        expect(codePoints(result.education)).toBe(1000);
        expect(codePoints(result.projects)).toBe(800);
        expect(codePoints(result.certifications)).toBe(800);
        expect(codePoints(result.languages)).toBe(300);
        expect(result.awards).toBe([...block(bold, 4), bold.repeat(96)].join('\n'));
    });

    it('does not split a surrogate pair when capping the summary', () => {
        const result = extractResumeFields(`SUMMARY\n${'a'.repeat(999)}\u{1F600}\u{1F600}`);

        expect(result.summary).toBe(`${'a'.repeat(999)}\u{1F600}`);
    });

    it('counts characters rather than code units when filtering short lines', () => {
        const result = extractResumeFields('AWARDS\n\u{1D400}\u{1D401}\u{1D402}\u{1D403}\u{1D404}\u{1D405}\nBest employee award 2022');

        expect(result.awards).toBe('Best employee award 2022');
    });

    it('uses an injected catalog', () => {
        const text = 'Max Mustermann\nBased in Berlin';
        const custom = new FieldExtractor(defineCatalog({ ...DEFAULT_CATALOG, gazetteer: ['berlin'] }));

        expect(extractResumeFields(text).location).toBe('');
        expect(custom.extract(text).location).toBe('Based in Berlin');
    });
});

describe('detectors', () => {
    it('skips contact lines when looking for the name', () => {
        const lines = ['jane@example.com', '+91 9876543210', 'Jane Q Doe'];
        expect(detectName(lines, DEFAULT_CATALOG.nameSkipMarkers)).toEqual({ found: true, value: 'Jane Q Doe' });
    });

    it('rejects single words and mostly numeric lines as names', () => {
        expect(detectName(['Resume', '2019 2020 2021'], DEFAULT_CATALOG.nameSkipMarkers)).toEqual({ found: false });
    });

    it('tries phone patterns in order', () => {
        expect(detectPhone('call 09876543210', DEFAULT_CATALOG.phonePatterns)).toEqual({
            found: true,
            value: '09876543210'
        });
        expect(detectPhone('call 12345', DEFAULT_CATALOG.phonePatterns)).toEqual({ found: false });
    });

    it('matches soft skills written with hyphens', () => {
        expect(detectSoftSkills('Known for clear communication and problem-solving under pressure.', DEFAULT_CATALOG.softSkills))
            .toEqual({ found: true, value: 'Communication, Problem Solving' });
    });

    it('infers a generic title from the skills text', () => {
        expect(inferTitleFromSkills('Data analysis, Excel')).toBe('Data Professional');
        expect(inferTitleFromSkills('Python, Django')).toBe('Software Developer');
        expect(inferTitleFromSkills('')).toBe('Professional');
    });

    it('splits skill tokens and drops very short ones', () => {
        expect(splitSkillTokens('Go | Rust / TypeScript • C, Kotlin')).toEqual(['Rust', 'TypeScript', 'Kotlin']);
    });

    it('splits on every line break form and drops blank lines', () => {
        expect(splitLines('a\r\nb\rc\f\n  \nd')).toEqual(['a', 'b', 'c', 'd']);
    });
});
