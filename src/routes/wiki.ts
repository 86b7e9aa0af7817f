import { Router } from 'express';
import { WikiController } from '../controllers/wikiController';
import { validateWikiSearch } from '../middlewares/validators/wiki/validateWikiSearch';

export function wikiRoutes(controller: WikiController): Router {
  const router = Router();

  // GET /api/wiki/search?query=...&lang=en&limit=10
  router.get('/search', validateWikiSearch, controller.search);

  return router;
}
