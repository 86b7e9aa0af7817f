import { Request, Response, NextFunction } from 'express';
import { formatApiResponse } from '../utils/formatApiResponse';
import { ContentSource } from '../types/content';

export function createWikiController(contentSource: ContentSource) {
  return {
    async search(req: Request, res: Response, next: NextFunction) {
      try {
        const query = String(req.query.query ?? '');
        const language = typeof req.query.lang === 'string' ? req.query.lang.toLowerCase() : 'en';
        const limit = req.query.limit === undefined ? 10 : Number(req.query.limit);
        const hits = await contentSource.search(query, language, limit);
        res.json(formatApiResponse('success', 'Search results', hits));
      } catch (err) {
        next(err);
      }
    },
  };
}

export type WikiController = ReturnType<typeof createWikiController>;
