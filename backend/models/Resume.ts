import mongoose, { Document, Schema } from 'mongoose';
import { ExtractedFields } from '../types/resume';

// 简历文档接口：20 个结构化字段加上导入和评分信息
export interface ResumeDocument extends Document, ExtractedFields {
    userId: string;
    templateName: string;
    sourceFileName: string;
    atsComplianceScore: number;
    atsIssues: string[];
    atsWarnings: string[];
    atsRecommendations: string[];
    createdAt: Date;
    updatedAt: Date;
}

const textField = { type: String, default: '' };

// 简历Schema定义
const ResumeSchema = new Schema<ResumeDocument>({
    userId: {
        type: String,
        required: true
    },
    templateName: {
        type: String,
        default: 'default'
    },
    sourceFileName: textField,
    title: textField,
    fullname: textField,
    email: textField,
    phone: textField,
    location: textField,
    summary: textField,
    skills: textField,
    experience: textField,
    education: textField,
    projects: textField,
    certifications: textField,
    awards: textField,
    languages: textField,
    linkedin: textField,
    github: textField,
    website: textField,
    dob: textField,
    nationality: textField,
    softskills: textField,
    career_objective: textField,
    atsComplianceScore: {
        type: Number,
        min: 0,
        max: 100,
        default: 0
    },
    atsIssues: {
        type: [String],
        default: []
    },
    atsWarnings: {
        type: [String],
        default: []
    },
    atsRecommendations: {
        type: [String],
        default: []
    }
}, {
    timestamps: true,
    toJSON: {
        virtuals: true,
        transform: function (_doc, ret) {
            delete ret.__v;
            return ret;
        }
    }
});

// 创建索引
ResumeSchema.index({ userId: 1, createdAt: -1 });

const Resume = mongoose.model<ResumeDocument>('Resume', ResumeSchema);

export default Resume;
