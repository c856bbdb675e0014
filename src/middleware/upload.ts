import multer from 'multer';
import path from 'path';
import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env';
import { BadRequestError } from '../errors';

export const ALLOWED_EXTENSIONS = ['.csv', '.txt'];

// Uploads stay in memory: a conversion reads the whole file once
const storage = multer.memoryStorage();

// File filter - allow delimited text exports only
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const ext = path.extname(file.originalname).toLowerCase();

  if (ALLOWED_EXTENSIONS.includes(ext)) {
    cb(null, true);
  } else {
    cb(new BadRequestError(`Only ${ALLOWED_EXTENSIONS.join(', ')} files are allowed`));
  }
};

// Create multer upload instance
export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: config.upload.maxFileSizeMB * 1024 * 1024, // Convert MB to bytes
  },
});

/**
 * Translates multer failures into BadRequestError for the central error handler
 */
export const handleUploadErrors = (err: unknown, _req: Request, _res: Response, next: NextFunction) => {
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return next(new BadRequestError(`Maximum file size is ${config.upload.maxFileSizeMB}MB`));
    }
    return next(new BadRequestError(`Upload error: ${err.message}`));
  }
  return next(err);
};
