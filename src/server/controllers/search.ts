import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RAGEngine } from '../../agent/rag-engine.js';
import { formatResultJSON } from '../../search/formatter.js';
import { SearchQuerySchema } from '../schemas.js';
import type { Controller } from './types.js';

/**
 * `GET /search?query=...&top_k=N`: retrieval without generation.
 */
export class SearchController implements Controller {
  public readonly router = Router();

  constructor(private readonly engine: RAGEngine) {
    this.router.get('/search', this.search.bind(this));
  }

  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { query, top_k } = SearchQuerySchema.parse(req.query);
      const documents = await this.engine.getDocuments(query, { topK: top_k });
      res.json({
        query,
        documents: documents.map((document) => formatResultJSON(document)),
      });
    } catch (error) {
      next(error);
    }
  }
}
