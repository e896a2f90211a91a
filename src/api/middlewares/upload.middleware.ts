import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ACCEPTED_CV_TYPES } from '../../services/cv-service';

/**
 * Multer upload configuration for CVs: kept in memory, PDF or plain text only
 */
export function createCvUpload(maxBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (ACCEPTED_CV_TYPES.includes(file.mimetype)) {
        cb(null, true);
      } else {
        cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
      }
    },
  });
}

/**
 * Turns Multer errors into 400 responses
 */
export const handleMulterError = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) => {
  if (!(error instanceof multer.MulterError)) {
    next(error);
    return;
  }

  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      res.status(400).json({ error: 'File size too large.' });
      return;
    case 'LIMIT_UNEXPECTED_FILE':
      res.status(400).json({ error: "Only a PDF or plain text file in the 'cv' field is accepted." });
      return;
    default:
      res.status(400).json({ error: error.message });
  }
};
