import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import multer from 'multer';
import * as dotenv from 'dotenv';
import { ExamPdfPipeline } from './services/ExamPdfPipeline.js';
import { createParsingRouter } from './routes/parsingRouter.js';
import { createLogger } from './utils/LoggerUtils.js';

// Load environment variables from .env.local
dotenv.config({ path: '.env.local' });

const logger = createLogger('SERVER');
const DEFAULT_PORT = parseInt(process.env['PORT'] || '8000', 10);

export function createApp(pipeline: ExamPdfPipeline = new ExamPdfPipeline()): express.Express {
  const app = express();

  // Trust proxy for rate limiting (needed for X-Forwarded-For header)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  // Rate limiting
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300
  }));

  // CORS configuration
  app.use(cors({
    origin: (process.env['CORS_ORIGINS'] || 'http://localhost:3000,http://127.0.0.1:3000').split(','),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type']
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  const apiKey = process.env['OPENAI_API_KEY'] || process.env['GEMINI_API_KEY'];
  if (apiKey) {
    pipeline.setApiKey(apiKey);
  }

  app.use('/api', createParsingRouter(pipeline));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: err.code, message: err.message });
      return;
    }
    logger.error('Unhandled request error', err);
    res.status(500).json({
      error: 'INTERNAL',
      message: process.env['NODE_ENV'] === 'development' && err instanceof Error ? err.message : 'Internal server error'
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  return app;
}

function startServer(port: number) {
  const server = createApp().listen(port, () => {
    logger.info(`Listening on port ${port}`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(`Port ${port} is already in use. Please free it and try again.`);
      process.exit(1);
    } else {
      logger.error('Server error', err);
      throw err;
    }
  });
}

// Start the server only when run directly
if (require.main === module) {
  startServer(DEFAULT_PORT);
}

export default createApp;
