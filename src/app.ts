import express from 'express';
import type Redis from 'ioredis';
import logger from './config/logger';
import { WhatsAppController } from './controllers/whatsapp.controller';
import { createWhatsAppRouter } from './routes/whatsapp.routes';
import { BookingRepository } from './services/booking.repository';
import { KnowledgeBase } from './services/knowledge.service';
import { errorMessage } from './utils/AppError';

export interface AppDependencies {
  controller: WhatsAppController;
  knowledge: KnowledgeBase;
  bookings: BookingRepository;
  redis: Redis | null;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use('/', createWhatsAppRouter(deps.controller)); // WhatsApp webhook at /webhook

  // Root endpoint
  app.get('/', (req, res) => {
    res.json({
      service: 'Seatline Bot API',
      status: 'running',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        whatsapp: {
          webhook: '/webhook (GET for verification, POST for messages)',
        },
      },
    });
  });

  // Health check endpoint with storage checks
  app.get('/health', async (req, res) => {
    const snapshot = deps.knowledge.current();
    try {
      if (deps.redis) {
        await deps.redis.ping();
      }
      await deps.bookings.ping();

      res.json({
        status: deps.knowledge.isReady ? 'ok' : 'starting',
        storage: 'connected',
        knowledgeBase: {
          version: snapshot.version,
          entries: snapshot.index.entries.length,
          builtAt: snapshot.builtAt.toISOString(),
        },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('Health check failed:', { error: errorMessage(error) });
      res.status(503).json({
        status: 'error',
        storage: 'disconnected',
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  return app;
}
