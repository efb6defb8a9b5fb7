import express from 'express';
import * as resumeController from '../controllers/resumeController';
import { authenticateToken, requireAuth } from '../middleware/auth';

const router = express.Router();

// 应用验证中间件
router.use(authenticateToken);
router.use(requireAuth);

// 新建空白简历
router.post('/', resumeController.createResume);

// 导入简历文件
router.post('/import', resumeController.importResume);

// 只做 ATS 评分
router.post('/ats-score', resumeController.scoreResume);

// 从文本提取字段
router.post('/parse-text', resumeController.parseText);

// 获取简历列表
router.get('/list', resumeController.getResumes);

// 获取简历详情
router.get('/:id', resumeController.getResumeById);

// 保存编辑
router.put('/:id', resumeController.updateResume);

// 重新评分
router.post('/:id/ats-score', resumeController.refreshAtsScore);

// 删除简历
router.delete('/:id', resumeController.deleteResume);

export default router;
