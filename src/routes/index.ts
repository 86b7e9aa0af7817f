import { Router } from 'express';
import { createPipelineController, createWikiController } from '../controllers';
import { PipelineCoordinator } from '../services/pipelineCoordinator';
import { ContentSource } from '../types/content';
import { pipelineRoutes } from './pipeline';
import { wikiRoutes } from './wiki';

export interface RouteDependencies {
  coordinator: PipelineCoordinator;
  contentSource: ContentSource;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();

  router.use('/pipeline', pipelineRoutes(createPipelineController(deps.coordinator)));
  router.use('/wiki', wikiRoutes(createWikiController(deps.contentSource)));

  return router;
}
