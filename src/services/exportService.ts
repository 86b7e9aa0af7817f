import { PipelineParameters, PipelineState } from '../types/pipeline';
import {
  ImageArtifact,
  StageName,
  StagePayloads,
  StageRecord,
  StageRecordMap,
  StageStatus,
  Topic,
} from '../types/stage';
import { shortHash } from '../utils/fingerprint';

/** Image bytes are left out of the export; consumers fetch them by scene index. */
export type ImageReference =
  | { index: number; kind: 'image'; provider: string; mimeType: string; bytes: number; prompt: string }
  | { index: number; kind: 'placeholder'; provider: string; reason: string; prompt: string };

export type ExportPayloads = Omit<StagePayloads, 'images'> & { images: { artifacts: ImageReference[] } };

export interface ExportEntry<S extends StageName> {
  stage: S;
  fingerprint: string;
  status: StageStatus;
  digest: string;
  createdAt: string;
  payload: ExportPayloads[S];
}

export type ExportedStage = { [K in StageName]: ExportEntry<K> }[StageName];

export interface TopicExport {
  fingerprint: string;
  topic: Topic;
  parameters: PipelineParameters;
  state: PipelineState;
  generatedAt: string;
  stages: ExportedStage[];
}

function entry<S extends StageName>(record: StageRecord<S>, payload: ExportPayloads[S]): ExportEntry<S> {
  return {
    stage: record.stage,
    fingerprint: record.fingerprint,
    status: record.status,
    digest: record.digest,
    createdAt: record.createdAt,
    payload,
  };
}

export function toImageReference(artifact: ImageArtifact): ImageReference {
  if (artifact.kind === 'placeholder') {
    return { ...artifact };
  }
  return {
    index: artifact.index,
    kind: 'image',
    provider: artifact.provider,
    mimeType: artifact.mimeType,
    bytes: Buffer.from(artifact.data, 'base64').length,
    prompt: artifact.prompt,
  };
}

/**
 * Concatenates the usable (`ok` or `partial`) records of one parameter chain in
 * pipeline order. The fingerprint covers the fingerprints of every included record.
 */
export function buildTopicExport(
  topic: Topic,
  parameters: PipelineParameters,
  state: PipelineState,
  records: StageRecordMap,
  now: Date = new Date()
): TopicExport {
  const stages: ExportedStage[] = [];
  const usable = <S extends StageName>(record: StageRecord<S> | undefined): record is StageRecord<S> =>
    record !== undefined && record.status !== 'failed';

  if (usable(records.extraction)) stages.push(entry(records.extraction, records.extraction.payload));
  if (usable(records.storyline)) stages.push(entry(records.storyline, records.storyline.payload));
  if (usable(records.scenePrompts)) stages.push(entry(records.scenePrompts, records.scenePrompts.payload));
  if (usable(records.narration)) stages.push(entry(records.narration, records.narration.payload));
  if (usable(records.images)) {
    stages.push(entry(records.images, { artifacts: records.images.payload.artifacts.map(toImageReference) }));
  }

  return {
    fingerprint: shortHash(stages.map((stage) => stage.fingerprint)),
    topic: { title: topic.title, language: topic.language },
    parameters,
    state,
    generatedAt: now.toISOString(),
    stages,
  };
}

function renderStage(stage: ExportedStage): string[] {
  switch (stage.stage) {
    case 'extraction': {
      const lines = ['## Article', '', stage.payload.summary || '_No summary._'];
      if (stage.payload.url) lines.push('', `Source: ${stage.payload.url}`);
      return lines;
    }
    case 'storyline':
      return [
        '## Storyline',
        ...stage.payload.scenes.flatMap((scene) => ['', `### Scene ${scene.index}: ${scene.title}`, '', scene.narrative]),
      ];
    case 'scenePrompts':
      return [
        '## Scene prompts',
        '',
        ...stage.payload.prompts.map((prompt) => `${prompt.index}. ${prompt.visual} _(${prompt.styleTag})_`),
      ];
    case 'narration':
      return ['## Narration', '', ...stage.payload.entries.map((item) => `${item.index}. ${item.text}`)];
    case 'images':
      return [
        '## Images',
        '',
        ...stage.payload.artifacts.map((artifact) =>
          artifact.kind === 'image'
            ? `${artifact.index}. ${artifact.provider}, ${artifact.mimeType}, ${artifact.bytes} bytes`
            : `${artifact.index}. placeholder (${artifact.reason})`
        ),
      ];
  }
}

export function renderExportMarkdown(doc: TopicExport): string {
  const lines = [`# ${doc.topic.title}`, '', `Language: ${doc.topic.language} · State: ${doc.state}`];
  for (const stage of doc.stages) {
    lines.push('', ...renderStage(stage));
  }
  return `${lines.join('\n')}\n`;
}
