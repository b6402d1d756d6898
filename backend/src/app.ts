import express, { type NextFunction, type Request, type Response } from 'express';
import { type ConfigManager, DEFAULT_MODEL } from './configManager.js';
import { ParleyError, RequestValidationError, errorMessage } from './errors.js';
import { createLogger, NAMESPACES } from './logging.js';
import { NegotiationService } from './services/NegotiationService.js';
import { parseNegotiationRequest } from './services/negotiationRequest.js';

const serverLog = createLogger(NAMESPACES.server.main);
const negotiateLog = createLogger(NAMESPACES.server.negotiate);

function isBodyParserError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && 'body' in err;
}

export function createApp(configManager: ConfigManager, service: NegotiationService = new NegotiationService(configManager)) {
  const app = express();

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Starts a negotiation from two character profiles and a topic.
  app.post('/negotiate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const defaultModel = configManager.getDefaultProfile().model ?? DEFAULT_MODEL;
      const request = parseNegotiationRequest(req.body, configManager.getNegotiationSettings(), defaultModel);
      negotiateLog('Negotiation on %s for %ds: %s vs %s', request.topic, request.duration_seconds, request.character1.name, request.character2.name);
      res.json(await service.negotiate(request));
    } catch (error) {
      next(error);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isBodyParserError(err)) {
      res.status(400).json({ error: 'Invalid JSON body', detail: err.message });
      return;
    }
    if (err instanceof RequestValidationError) {
      res.status(err.status).json({ error: err.message, details: err.issues });
      return;
    }
    if (err instanceof ParleyError) {
      serverLog('Request failed with %s: %s', err.name, err.message);
      res.status(err.status).json({ detail: err.message });
      return;
    }
    console.error('[server] Unhandled error:', errorMessage(err));
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}
