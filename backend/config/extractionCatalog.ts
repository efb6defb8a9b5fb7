import softSkillVocabulary from '../data/soft-skills.json';
import { SectionField } from '../types/resume';

export interface NamedPattern {
    name: string;
    pattern: RegExp;
}

export interface SectionRule {
    field: SectionField;
    // 顺序有意义：列表中第一个命中的模式生效
    patterns: readonly NamedPattern[];
    // 章节内容的最大行数
    maxLines: number;
}

export interface ExtractionCatalog {
    readonly sections: readonly SectionRule[];
    readonly careerObjectivePattern: RegExp;
    readonly paginationPattern: RegExp;
    readonly phonePatterns: readonly RegExp[];
    readonly nameSkipMarkers: readonly string[];
    readonly gazetteer: readonly string[];
    readonly titleKeywords: readonly string[];
    readonly degreeKeywords: readonly string[];
    readonly softSkills: readonly string[];
}

const named = (name: string, source: string, flags = 'i'): NamedPattern => ({
    name,
    pattern: new RegExp(source, flags)
});

/**
 * 冻结目录，防止运行时被修改
 */
export function defineCatalog(catalog: ExtractionCatalog): ExtractionCatalog {
    return Object.freeze({
        ...catalog,
        sections: Object.freeze(catalog.sections.map((rule) => Object.freeze({
            ...rule,
            patterns: Object.freeze(rule.patterns.map((p) => Object.freeze({ ...p })))
        }))),
        phonePatterns: Object.freeze([...catalog.phonePatterns]),
        nameSkipMarkers: Object.freeze([...catalog.nameSkipMarkers]),
        gazetteer: Object.freeze([...catalog.gazetteer]),
        titleKeywords: Object.freeze([...catalog.titleKeywords]),
        degreeKeywords: Object.freeze([...catalog.degreeKeywords]),
        softSkills: Object.freeze([...catalog.softSkills])
    });
}

const PHONE_COUNTRY_CODE = '+91';

export const DEFAULT_SECTION_RULES: readonly SectionRule[] = [
    {
        field: 'summary',
        maxLines: 10,
        patterns: [
            named('careerObjective', 'career\\s+objective'),
            named('objective', '^objective$'),
            named('professionalSummary', 'professional\\s+summary'),
            named('summary', 'summary'),
            named('profile', 'profile'),
            named('aboutMe', 'about\\s+me')
        ]
    },
    {
        field: 'skills',
        maxLines: 20,
        patterns: [
            named('technicalSkills', 'technical\\s+skills'),
            named('skills', '^skills$'),
            named('coreCompetencies', 'core\\s+competencies'),
            named('keySkills', 'key\\s+skills'),
            named('skillsAndTools', 'skills\\s+and\\s+tools')
        ]
    },
    {
        field: 'experience',
        maxLines: 30,
        patterns: [
            named('professionalExperience', 'professional\\s+experience'),
            named('workExperience', 'work\\s+experience'),
            named('experience', '^experience$'),
            named('employmentHistory', 'employment\\s+history'),
            named('careerHistory', 'career\\s+history'),
            named('internshipExperience', 'internship\\s+experience')
        ]
    },
    {
        field: 'projects',
        maxLines: 30,
        patterns: [
            named('academicProjects', 'academic\\s+projects'),
            named('keyProjects', 'key\\s+projects'),
            named('projects', '^projects$'),
            named('personalProjects', 'personal\\s+projects')
        ]
    },
    {
        field: 'education',
        maxLines: 20,
        patterns: [
            named('education', '^education$'),
            named('academicBackground', 'academic\\s+background'),
            named('educationalQualification', 'educational\\s+qualification'),
            named('academicQualifications', 'academic\\s+qualifications'),
            named('educationDetails', 'education\\s+details')
        ]
    },
    {
        field: 'certifications',
        maxLines: 15,
        patterns: [
            named('certifications', '^certifications?$'),
            named('professionalCertifications', 'professional\\s+certifications?'),
            named('licenses', 'licenses?'),
            named('courses', 'courses')
        ]
    },
    {
        field: 'languages',
        maxLines: 5,
        patterns: [
            named('languagesKnown', 'languages?\\s+known'),
            named('languages', '^languages?$')
        ]
    },
    {
        field: 'awards',
        maxLines: 15,
        patterns: [
            named('awards', '^awards$'),
            named('achievements', 'achievements'),
            named('honors', 'honors')
        ]
    }
];

export const DEFAULT_CATALOG: ExtractionCatalog = defineCatalog({
    sections: DEFAULT_SECTION_RULES,
    careerObjectivePattern: /career\s+objective/i,
    paginationPattern: /^page\s+\d+/i,
    phonePatterns: [
        /\+91[\s-]?\d{10}/,
        /\b0\d{10}\b/,
        /\b\d{10}\b/
    ],
    nameSkipMarkers: ['@', 'http', PHONE_COUNTRY_CODE],
    gazetteer: [
        'ahmedabad', 'gandhinagar', 'vadodara', 'surat',
        'delhi', 'mumbai', 'bangalore', 'pune', 'hyderabad',
        'kolkata', 'firozabad', 'india', 'gujarat',
        'usa', 'uk', 'canada'
    ],
    titleKeywords: [
        'engineer', 'developer', 'analyst', 'manager', 'specialist',
        'consultant', 'architect', 'designer', 'scientist', 'executive',
        'coordinator'
    ],
    degreeKeywords: ['b.tech', 'b.e', 'bachelor', 'master', 'phd', 'degree'],
    softSkills: softSkillVocabulary
});
