import express from 'express';
import cors from 'cors';
import multer from 'multer';
import { Server } from 'http';
import { logger } from './utils/logger';
import { ServerConfig } from './types';
import { RAGService } from './core/rag-service';
import { NotFoundError, RagError, ValidationError, errorMessage } from './types/api';

type UploadOutcome =
  | { file: string; chunksCount: number; replacedChunks: number; uploadId: string }
  | { file: string; error: string; code: string };

function parseDocuments(value: unknown): string[] | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.split(',').map(name => name.trim()).filter(name => name.length > 0);
  }
  if (Array.isArray(value) && value.every((name): name is string => typeof name === 'string')) {
    return value;
  }
  throw new ValidationError('documents must be a list of filenames or a comma-separated string');
}

function parseLimit(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const limit = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError('k must be a positive integer');
  }
  return limit;
}

export class RAGServer {
  private app: express.Application;
  private upload: multer.Multer;
  private server: Server | null = null;

  constructor(
    private readonly ragService: RAGService,
    private readonly options: ServerConfig
  ) {
    this.app = express();
    this.upload = multer({
      storage: multer.memoryStorage(),
      limits: {
        fileSize: options.maxFileSizeMb * 1024 * 1024,
        files: options.maxFilesPerUpload
      }
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.options.corsOrigin,
      credentials: true
    }));

    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true }));

    // Request logging
    this.app.use((req, _res, next) => {
      logger.info(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('User-Agent')
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    // Upload documents (multipart, field "files")
    this.app.post('/api/documents', this.upload.array('files'), async (req, res, next) => {
      try {
        const files = Array.isArray(req.files) ? req.files : [];
        if (files.length === 0) {
          throw new ValidationError('No files uploaded');
        }

        logger.info(`Upload request: ${files.length} files`);

        // One bad file does not stop the others
        const results: UploadOutcome[] = [];
        for (const file of files) {
          try {
            const result = await this.ragService.ingest(file.originalname, file.buffer, { fileType: file.mimetype });
            results.push({
              file: file.originalname,
              chunksCount: result.chunksCount,
              replacedChunks: result.replacedChunks,
              uploadId: result.uploadId
            });
          } catch (error) {
            logger.warn(`Failed to process ${file.originalname}`, { error: errorMessage(error) });
            results.push({
              file: file.originalname,
              error: errorMessage(error),
              code: error instanceof RagError ? error.code : 'INTERNAL_ERROR'
            });
          }
        }

        const indexed = results.filter(result => !('error' in result));
        const totalChunks = indexed.reduce((sum, result) => sum + ('chunksCount' in result ? result.chunksCount : 0), 0);

        res.status(indexed.length > 0 ? 200 : 422).json({
          success: indexed.length > 0,
          data: {
            message: `Processed ${files.length} files: ${indexed.length} successful, ${files.length - indexed.length} failed`,
            totalChunks,
            results
          },
          timestamp: new Date().toISOString()
        });
      } catch (error) {
        next(error);
      }
    });

    // List documents
    this.app.get('/api/documents', async (_req, res, next) => {
      try {
        const listing = await this.ragService.listDocuments();
        res.json({ success: true, data: listing, timestamp: new Date().toISOString() });
      } catch (error) {
        next(error);
      }
    });

    // Delete one document
    this.app.delete('/api/documents/:filename', async (req, res, next) => {
      try {
        const { filename } = req.params;
        const chunksDeleted = await this.ragService.deleteDocument(filename);
        if (chunksDeleted === 0) {
          throw new NotFoundError(`Document '${filename}'`, { filename, operation: 'delete' });
        }
        res.json({
          success: true,
          data: { message: `Deleted '${filename}'`, chunksDeleted },
          timestamp: new Date().toISOString()
        });
      } catch (error) {
        next(error);
      }
    });

    // Delete every document
    this.app.delete('/api/documents', async (_req, res, next) => {
      try {
        const chunksDeleted = await this.ragService.deleteAll();
        res.json({
          success: true,
          data: { message: chunksDeleted > 0 ? 'Deleted all documents' : 'No documents to delete', chunksDeleted },
          timestamp: new Date().toISOString()
        });
      } catch (error) {
        next(error);
      }
    });

    // Ask a question
    this.app.post('/api/chat', async (req, res, next) => {
      try {
        const body: Record<string, unknown> = req.body ?? {};
        const { question, sessionId } = body;

        if (typeof question !== 'string' || !question.trim()) {
          throw new ValidationError('Question is required');
        }
        if (sessionId !== undefined && typeof sessionId !== 'string') {
          throw new ValidationError('sessionId must be a string');
        }

        const result = await this.ragService.answer({
          question,
          sessionId,
          limit: parseLimit(body.k),
          documents: parseDocuments(body.documents)
        });

        res.json({ success: true, data: result, timestamp: new Date().toISOString() });
      } catch (error) {
        next(error);
      }
    });

    // Forget a conversation
    this.app.delete('/api/sessions/:sessionId', async (req, res, next) => {
      try {
        await this.ragService.clearSession(req.params.sessionId);
        res.json({ success: true, data: { sessionId: req.params.sessionId }, timestamp: new Date().toISOString() });
      } catch (error) {
        next(error);
      }
    });

    // Restrict a conversation to some documents
    this.app.put('/api/sessions/:sessionId/scope', async (req, res, next) => {
      try {
        const body: Record<string, unknown> = req.body ?? {};
        const documents = parseDocuments(body.documents) ?? [];
        await this.ragService.setSessionScope(req.params.sessionId, documents);
        res.json({
          success: true,
          data: { sessionId: req.params.sessionId, documents },
          timestamp: new Date().toISOString()
        });
      } catch (error) {
        next(error);
      }
    });
  }

  /**
   * Setup error handling
   */
  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((_req, res) => {
      res.status(404).json({
        success: false,
        error: 'Endpoint not found',
        timestamp: new Date().toISOString()
      });
    });

    // Global error handler
    this.app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (error instanceof RagError) {
        if (error.statusCode >= 500) {
          logger.error(`${req.method} ${req.path} failed`, error, { ...error.context });
        }
        res.status(error.statusCode).json({
          success: false,
          error: error.message,
          code: error.code,
          context: error.context,
          timestamp: new Date().toISOString()
        });
        return;
      }

      if (error instanceof multer.MulterError) {
        res.status(400).json({
          success: false,
          error: error.message,
          code: error.code,
          timestamp: new Date().toISOString()
        });
        return;
      }

      logger.error('Unhandled error', error);
      res.status(500).json({
        success: false,
        error: 'Internal server error',
        timestamp: new Date().toISOString()
      });
    });
  }

  /**
   * Start the server
   */
  async start(port: number = this.options.port, host: string = this.options.host): Promise<Server> {
    await this.ragService.initialize();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        logger.info(`RAG Server running on http://${host}:${port}`);
        logger.info(`CORS enabled for: ${this.options.corsOrigin}`);
        resolve(server);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Get the Express app (for testing)
   */
  getApp(): express.Application {
    return this.app;
  }
}
