/**
 * Generate Comic
 *
 * Advances one Wikipedia topic through the pipeline and prints the run result.
 * Stored stages are reused, so re-running with the same arguments is free.
 *
 * Usage:
 *   npx ts-node scripts/generateComic.ts --title "Albert Einstein" --lang en --target complete \
 *     --scenes 5 --style manga [--length medium] [--audience general] [--education standard] \
 *     [--narration dramatic] [--tone engaging] [--force] [--export json|markdown]
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

import minimist from 'minimist';
import { env } from '../src/config/env';
import { buildPipelineConfig } from '../src/config/pipelineConfig';
import { disconnectRedis } from '../src/config/redisClient';
import { createStageStore } from '../src/repository';
import { createPipelineServices, renderExportMarkdown, resolveParameters } from '../src/services';
import { TARGET_STAGES, TargetStageSchema } from '../src/types/pipeline';
import { ProviderAttempt } from '../src/types/provider';
import { errorMessage } from '../src/utils/errorHandler';
import { createTopic } from '../src/utils/topic';

const USAGE = 'Usage: generateComic --title "<article>" [--lang en] [--target complete] [--scenes 5] [--style manga] [--force]';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function parseCliArgs(argv: string[]) {
  const args = minimist(argv, {
    string: ['title', 'lang', 'target', 'style', 'length', 'audience', 'education', 'narration', 'tone', 'export'],
    boolean: ['force', 'help', 'verbose'],
    alias: { t: 'title', l: 'lang', s: 'scenes', f: 'force', h: 'help' },
    default: { lang: 'en', target: 'complete' },
  });

  const title = optionalString(args.title);
  if (args.help || !title) {
    return null;
  }

  const target = TargetStageSchema.safeParse(args.target);
  if (!target.success) {
    throw new Error(`--target must be one of ${TARGET_STAGES.join(', ')}`);
  }
  const exportFormat = optionalString(args.export);

  return {
    topic: createTopic(title, optionalString(args.lang) ?? 'en'),
    targetStage: target.data,
    // omitted options take their defaults
    parameters: resolveParameters({
      length: optionalString(args.length),
      sceneCount: args.scenes === undefined ? undefined : Number(args.scenes),
      artStyle: optionalString(args.style),
      audience: optionalString(args.audience),
      educationLevel: optionalString(args.education),
      narrationStyle: optionalString(args.narration),
      voiceTone: optionalString(args.tone),
    }),
    force: args.force === true,
    verbose: args.verbose === true,
    exportFormat: exportFormat === 'json' || exportFormat === 'markdown' ? exportFormat : undefined,
  };
}

function describeAttempt(event: ProviderAttempt): string {
  const scene = event.sceneIndex === undefined ? '' : ` scene ${event.sceneIndex}`;
  const code = event.errorCode ? ` (${event.errorCode})` : '';
  return `  [${event.capability}] ${event.provider}${scene} attempt ${event.attempt}: ${event.outcome}${code} ${event.durationMs}ms`;
}

async function generateComic(argv: string[]): Promise<number> {
  const cli = parseCliArgs(argv);
  if (!cli) {
    console.error(USAGE);
    return 2;
  }

  const config = buildPipelineConfig(env);
  const store = await createStageStore(config.store);
  const { coordinator } = createPipelineServices(config, store, {
    onAttempt: cli.verbose ? (event) => console.error(describeAttempt(event)) : undefined,
  });

  const abort = new AbortController();
  process.once('SIGINT', () => {
    console.error('Interrupted; stopping after the current stage');
    abort.abort();
  });

  const { parameters } = cli;
  console.error(`Advancing "${cli.topic.title}" (${cli.topic.language}) to ${cli.targetStage}`);
  const result = await coordinator.advance(cli.topic, cli.targetStage, parameters, {
    force: cli.force,
    signal: abort.signal,
  });

  for (const stage of result.stages) {
    console.error(`  ${stage.stage}: ${stage.status}${stage.reused ? ' (reused)' : ''} ${stage.fingerprint}`);
  }
  if (result.candidates) {
    console.error(`"${cli.topic.title}" is a disambiguation page. Try one of:`);
    result.candidates.forEach((candidate) => console.error(`  - ${candidate}`));
    return 1;
  }
  if (result.failure) {
    console.error(`Failed at ${result.failure.stage} [${result.failure.code}]: ${result.failure.message}`);
    return 1;
  }

  if (cli.exportFormat) {
    const document = await coordinator.exportTopic(cli.topic, parameters);
    console.log(cli.exportFormat === 'markdown' ? renderExportMarkdown(document) : JSON.stringify(document, null, 2));
  } else {
    console.log(JSON.stringify(result, null, 2));
  }
  return 0;
}

if (require.main === module) {
  generateComic(process.argv.slice(2))
    .catch((err: unknown) => {
      console.error(`❌ ${errorMessage(err)}`);
      return 1;
    })
    .then(async (code) => {
      await disconnectRedis();
      process.exit(code);
    })
    .catch((err: unknown) => {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    });
}
