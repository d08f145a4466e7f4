/**
 * Exam PDF parsing router
 * Question booklets, answer keys and the merge of the two.
 */

import express from 'express';
import multer from 'multer';
import { ParsingController } from '../controllers/ParsingController.js';
import { ExamPdfPipeline } from '../services/ExamPdfPipeline.js';

export const MAX_PDF_BYTES = 50 * 1024 * 1024;

export function createParsingRouter(pipeline: ExamPdfPipeline): express.Router {
  // --- Configure Multer ---
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: MAX_PDF_BYTES, // 50MB limit per file
      files: 1
    }
  });

  const controller = new ParsingController(pipeline);
  const router = express.Router();

  router.post('/set-api-key', controller.setApiKey);
  router.get('/status', controller.status);
  router.post('/parse-pdf', upload.single('file'), controller.parseQuestions);
  router.post('/parse-answer', upload.single('file'), controller.parseAnswerKey);
  router.post('/merge', controller.merge);

  return router;
}

export default createParsingRouter;
