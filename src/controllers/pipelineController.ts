import { Request, Response, NextFunction } from 'express';
import { formatApiResponse } from '../utils/formatApiResponse';
import { ApiError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { createTopic } from '../utils/topic';
import { PipelineCoordinator } from '../services/pipelineCoordinator';
import { renderExportMarkdown, toImageReference } from '../services/exportService';
import { TargetStageSchema } from '../types/pipeline';
import { StageNameSchema, StageRecord, isRecordFor } from '../types/stage';
import '../types/http';

const DEFAULT_LANGUAGE = 'en';

function topicFromBody(req: Request) {
  return createTopic(String(req.body?.title ?? ''), String(req.body?.language ?? DEFAULT_LANGUAGE));
}

function topicFromParams(req: Request) {
  return createTopic(req.params.title, req.params.language);
}

function recordSummary(record: StageRecord) {
  return {
    stage: record.stage,
    fingerprint: record.fingerprint,
    status: record.status,
    digest: record.digest,
    createdAt: record.createdAt,
  };
}

export function createPipelineController(coordinator: PipelineCoordinator) {
  return {
    async advance(req: Request, res: Response, next: NextFunction) {
      try {
        const topic = topicFromBody(req);
        const targetStage = TargetStageSchema.parse(req.body.targetStage);
        // Stop between stages if the client goes away
        const abort = new AbortController();
        res.on('close', () => {
          if (!res.writableFinished) abort.abort();
        });
        const result = await coordinator.advance(topic, targetStage, req.body.parameters ?? {}, {
          force: req.body.force === true,
          signal: abort.signal,
        });
        logger.info(
          { requestId: req.requestId, title: topic.title, targetStage, state: result.state },
          '[PIPELINE] advance finished'
        );
        const failed = result.state === 'Failed';
        res
          .status(failed ? 422 : 200)
          .json(formatApiResponse(failed ? 'error' : 'success', failed ? 'Pipeline failed' : `Pipeline ${result.state}`, result));
      } catch (err) {
        next(err);
      }
    },

    async status(req: Request, res: Response, next: NextFunction) {
      try {
        const status = await coordinator.status(topicFromBody(req), req.body.parameters ?? {});
        res.json(formatApiResponse('success', 'Pipeline status', status));
      } catch (err) {
        next(err);
      }
    },

    async regenerateNarration(req: Request, res: Response, next: NextFunction) {
      try {
        const record = await coordinator.regenerateNarration(
          topicFromBody(req),
          Number(req.body.sceneIndex),
          req.body.parameters ?? {},
          typeof req.body.context === 'string' ? req.body.context : undefined
        );
        res.json(formatApiResponse('success', 'Narration regenerated', record));
      } catch (err) {
        next(err);
      }
    },

    async exportTopic(req: Request, res: Response, next: NextFunction) {
      try {
        const document = await coordinator.exportTopic(topicFromBody(req), req.body.parameters ?? {});
        if (req.body.format === 'markdown') {
          res.type('text/markdown').send(renderExportMarkdown(document));
          return;
        }
        res.json(formatApiResponse('success', 'Export ready', document));
      } catch (err) {
        next(err);
      }
    },

    async listRecords(req: Request, res: Response, next: NextFunction) {
      try {
        const records = await coordinator.records(topicFromParams(req));
        res.json(formatApiResponse('success', 'Stage records', records.map(recordSummary)));
      } catch (err) {
        next(err);
      }
    },

    async getRecord(req: Request, res: Response, next: NextFunction) {
      try {
        const stage = StageNameSchema.parse(req.params.stage);
        const record = await coordinator.record(topicFromParams(req), stage, req.params.fingerprint);
        if (!record) throw new ApiError('Stage record not found', 404);
        if (isRecordFor(record, 'images')) {
          // Bytes are served by the image endpoint
          const artifacts = record.payload.artifacts.map(toImageReference);
          res.json(formatApiResponse('success', 'Stage record', { ...record, payload: { artifacts } }));
          return;
        }
        res.json(formatApiResponse('success', 'Stage record', record));
      } catch (err) {
        next(err);
      }
    },

    async getImage(req: Request, res: Response, next: NextFunction) {
      try {
        const sceneIndex = Number(req.params.sceneIndex);
        const image = await coordinator.sceneImage(topicFromParams(req), req.params.fingerprint, sceneIndex);
        res.setHeader('X-Image-Kind', image.kind);
        res.type(image.mimeType).send(image.data);
      } catch (err) {
        next(err);
      }
    },
  };
}

export type PipelineController = ReturnType<typeof createPipelineController>;
