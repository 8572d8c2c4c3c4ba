import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import multer from 'multer';
import * as dotenv from 'dotenv';
import { pathToFileURL } from 'url';
import { loadPipelineConfig, type PipelineConfig } from './config/pipeline.js';
import { ParseDocsController, type ParseDocsPipeline } from './controllers/ParseDocsController.js';
import { createParseDocsRouter } from './routes/parseDocs.js';
import { createDocumentParsePipeline } from './services/pipeline/DocumentParsePipeline.js';
import { ErrorHandler } from './utils/errorHandler.js';
import { PipelineLogger } from './utils/LoggerUtils.js';

export interface ServerDeps {
  pipeline: ParseDocsPipeline;
  config: PipelineConfig;
}

export function createServerApp({ pipeline, config }: ServerDeps): express.Express {
  const app = express();

  // Trust proxy for rate limiting (needed for X-Forwarded-For header)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  // Rate limiting
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: config.server.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false
  }));

  // CORS configuration
  app.use(cors({
    origin: config.server.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // API info endpoint
  app.get('/api', (_req, res) => {
    res.json({
      name: 'Exam Paper Parser API',
      version: '1.0.0',
      description: 'Converts scanned exam papers (images or a PDF) into question-level JSON',
      endpoints: {
        health: 'GET /health',
        parseDocs: 'POST /parse-docs (multipart field "files")'
      }
    });
  });

  app.use('/parse-docs', createParseDocsRouter(new ParseDocsController(pipeline, config)));

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const isUploadError = err instanceof multer.MulterError;
    const status = isUploadError ? 400 : ErrorHandler.getHttpStatus(err);
    PipelineLogger.error('SERVER', `Request failed (${status})`, err);
    res.status(status).json({
      success: false,
      request_id: '',
      data: null,
      errors: [isUploadError ? ErrorHandler.getMessage(err) : 'Internal server error'],
      warnings: []
    });
  });

  // 404 handler
  app.use('*', (_req, res) => {
    res.status(404).json({ success: false, errors: ['Route not found'] });
  });

  return app;
}

function startServer(config: PipelineConfig) {
  const app = createServerApp({ pipeline: createDocumentParsePipeline(config), config });
  const server = app.listen(config.server.port, () => {
    PipelineLogger.success('SERVER', `Listening on http://localhost:${config.server.port} (OCR engine: ${config.ocr.engine})`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      PipelineLogger.error('SERVER', `Port ${config.server.port} is already in use`);
      process.exit(1);
    }
    throw err;
  });
}

// Start the server only when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  // Load environment variables from .env.local, then .env
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  startServer(loadPipelineConfig());
}
