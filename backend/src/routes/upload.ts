import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { extractTextFromFile } from '../services/fileExtractor.js';
import { ValidationError } from '../utils/errors.js';
import { UploadFileResponse } from '../types/index.js';

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

export function createUploadRoutes(): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES }
  });

  /**
   * POST /api/upload-file
   * multipart field "file" (.txt / .docx) -> extracted text
   */
  router.post('/upload-file', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new ValidationError('No file uploaded');
      }

      const filename = req.file.originalname;
      const content = await extractTextFromFile(filename, req.file.buffer);
      console.log(`[Upload] ${filename}: ${content.length} chars`);

      const body: UploadFileResponse = { content, filename };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
