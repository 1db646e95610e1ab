import { Router } from 'express';
import logger from '../config/logger';
import { WhatsAppController } from '../controllers/whatsapp.controller';
import { errorMessage } from '../utils/AppError';

/**
 * WhatsApp webhook endpoints
 * GET /webhook - Webhook verification (Meta requirement)
 * POST /webhook - Incoming messages and events
 */
export function createWhatsAppRouter(controller: WhatsAppController): Router {
  const router = Router();

  router.get('/webhook', (req, res) => {
    controller.verifyWebhook(req, res);
  });

  router.post('/webhook', async (req, res) => {
    try {
      await controller.receiveWebhook(req, res);
    } catch (error) {
      logger.error('Unhandled webhook receive error:', { error: errorMessage(error) });
      // Fallback error handler - only send if response hasn't been sent
      if (!res.headersSent) {
        res.status(500).send('Internal error');
      }
    }
  });

  return router;
}
