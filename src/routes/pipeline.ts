import { Router } from 'express';
import { PipelineController } from '../controllers/pipelineController';
import { generationLimiter } from '../middlewares/rateLimiter';
import {
  validateAdvance,
  validateExport,
  validateImageGet,
  validateNarrationRegenerate,
  validateRecordGet,
  validateRecordList,
  validateStatus,
} from '../middlewares/validators/pipeline/validatePipeline';

export function pipelineRoutes(controller: PipelineController): Router {
  const router = Router();

  // POST /api/pipeline/advance
  router.post('/advance', generationLimiter, validateAdvance, controller.advance);
  // POST /api/pipeline/status
  router.post('/status', validateStatus, controller.status);
  // POST /api/pipeline/export
  router.post('/export', validateExport, controller.exportTopic);
  // POST /api/pipeline/narration/regenerate
  router.post('/narration/regenerate', generationLimiter, validateNarrationRegenerate, controller.regenerateNarration);

  // GET /api/pipeline/:language/:title/records[/:stage/:fingerprint]
  router.get('/:language/:title/records', validateRecordList, controller.listRecords);
  router.get('/:language/:title/records/:stage/:fingerprint', validateRecordGet, controller.getRecord);
  router.get('/:language/:title/images/:fingerprint/:sceneIndex', validateImageGet, controller.getImage);

  return router;
}
