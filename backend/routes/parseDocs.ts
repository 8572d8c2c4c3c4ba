/**
 * Document parsing router
 * Images and PDFs arrive as multipart `files`; buffers stay in memory until staged by the controller.
 */

import express from 'express';
import multer from 'multer';
import type { ParseDocsController } from '../controllers/ParseDocsController.js';

// --- Configure Multer ---
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB limit per file
    files: 50 // Maximum 50 files
  }
});

export function createParseDocsRouter(controller: ParseDocsController): express.Router {
  const router = express.Router();

  /**
   * POST /parse-docs
   */
  router.post('/', upload.array('files'), controller.handle);

  return router;
}
