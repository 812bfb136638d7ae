import { Router, type Request, type Response } from 'express';
import type { Config } from '../../config/schema.js';
import { VERSION } from '../../utils/version.js';
import type { Controller } from './types.js';

export const API_NAME = 'rag-chat API';

/**
 * `GET /` (service description) and `GET /health`.
 */
export class HealthController implements Controller {
  public readonly router = Router();

  constructor(private readonly config: Config) {
    this.router.get('/', this.root.bind(this));
    this.router.get('/health', this.health.bind(this));
  }

  root(_req: Request, res: Response): void {
    res.json({ name: API_NAME, version: VERSION, health: '/health' });
  }

  health(_req: Request, res: Response): void {
    res.json({
      status: 'healthy',
      endpointConfigured: Boolean(this.config.openai.endpoint),
      model: this.config.openai.chat_deployment,
    });
  }
}
