import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppConfig } from "../config/index.js";
import { UploadController } from "../controllers/uploadController.js";

export const UPLOAD_FIELD = "files";

export class InvalidFileTypeError extends Error {
  constructor(fileName: string) {
    super(`Invalid file type for ${fileName}. Only PDF files are allowed.`);
    this.name = "InvalidFileTypeError";
  }
}

export function createUploadRouter(controller: UploadController, config: AppConfig): Router {
  const router = Router();

  // Configure multer for memory storage
  const storage = multer.memoryStorage();
  // Part filenames arrive as UTF-8 (multer defaults to latin1)
  const options: multer.Options & { defParamCharset?: string } = {
    storage,
    defParamCharset: "utf8",
    limits: {
      fileSize: config.maxFileSizeMb * 1024 * 1024,
      files: config.maxFiles,
    },
    fileFilter: (_req, file, cb) => {
      if (
        file.mimetype === "application/pdf" ||
        file.originalname.toLowerCase().endsWith(".pdf")
      ) {
        cb(null, true);
      } else {
        cb(new InvalidFileTypeError(file.originalname));
      }
    },
  };
  const upload = multer(options);

  // POST /api/process - Extract daily balances from the uploaded statements
  router.post("/process", upload.array(UPLOAD_FIELD), (req, res, next) => {
    controller.processFiles(req, res).catch(next);
  });

  // GET /api/report - Current report, split into found balances and failures
  router.get("/report", (req, res) => {
    controller.getReport(req, res);
  });

  // GET /api/report/download - Current report as a spreadsheet
  router.get("/report/download", (req, res) => {
    controller.downloadReport(req, res);
  });

  // DELETE /api/report - Start over with an empty report
  router.delete("/report", (req, res) => {
    controller.resetReport(req, res);
  });

  // Error handling middleware for multer errors
  router.use((err: Error, _req: Request, res: Response, next: NextFunction) => {
    console.error("Upload route error:", err);
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        res.status(400).json({
          error: `File size exceeds ${config.maxFileSizeMb}MB limit`,
        });
        return;
      }
      if (err.code === "LIMIT_FILE_COUNT") {
        res.status(400).json({
          error: `Too many files. At most ${config.maxFiles} files per batch.`,
        });
        return;
      }
      res.status(400).json({
        error: `Upload error: ${err.message}`,
      });
      return;
    }
    if (err instanceof InvalidFileTypeError) {
      res.status(400).json({ error: err.message });
      return;
    }
    next(err);
  });

  return router;
}
