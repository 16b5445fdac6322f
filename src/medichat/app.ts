import express from 'express';
import cors from 'cors';
import path from 'path';
import { AppConfig } from './config';
import { ChatWorkflow } from './workflows/chat-workflow';
import { ChatResponse, ErrorResponse } from './types';

export const PUBLIC_DIR = path.join(__dirname, '..', '..', 'public');

export interface AppDeps {
  config: AppConfig;
  chatWorkflow: ChatWorkflow;
}

interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

export function createApp({ config, chatWorkflow }: AppDeps): express.Express {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept']
  }));

  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  app.get('/', (req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
  });

  app.get('/chat', (req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, 'chat.html'));
  });

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      environment: config.environment
    });
  });

  app.post('/api/chat', async (req, res) => {
    try {
      const response = await chatWorkflow.handle(req.body);
      const payload: ChatResponse = { response };
      res.json(payload);
    } catch (error) {
      console.error('🚨 Critical error in chat processing route:', error);
      const detail = error instanceof Error ? error.message : String(error);
      const payload: ErrorResponse = { error: `An internal server error occurred: ${detail}` };
      res.status(500).json(payload);
    }
  });

  app.use('*', (req, res) => {
    console.log(`⚠️  Unhandled route: ${req.method} ${req.originalUrl}`);
    res.status(404).json({
      error: 'Route not found',
      method: req.method,
      path: req.originalUrl,
      availableEndpoints: [
        'GET /',
        'GET /chat',
        'GET /api/health',
        'POST /api/chat'
      ]
    });
  });

  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
      console.warn(`⚠️  Rejected malformed JSON body on ${req.method} ${req.path}`);
      res.status(400).json({ error: `Invalid JSON body: ${error.message}` });
      return;
    }
    if (isBodyParserError(error) && error.type === 'entity.too.large') {
      console.warn(`⚠️  Rejected oversized body on ${req.method} ${req.path}`);
      res.status(413).json({ error: 'Request body too large' });
      return;
    }
    console.error('🚨 Global error handler:', error);
    res.status(500).json({
      error: 'Internal server error',
      message: error instanceof Error ? error.message : String(error)
    });
  });

  return app;
}
