import { body, param } from 'express-validator';
import {
  AUDIENCES,
  EDUCATION_LEVELS,
  MAX_SCENES,
  NARRATION_STYLES,
  STORY_LENGTHS,
  TARGET_STAGES,
  VOICE_TONES,
} from '../../../types/pipeline';
import { STAGE_ORDER } from '../../../types/stage';
import { handleValidation } from '../handleValidation';

const LANGUAGE = /^[a-z]{2,3}(-[a-z0-9]+)*$/i;
// MediaWiki caps titles at 255 bytes of UTF-8
export const MAX_TITLE_BYTES = 255;

const topicBody = [
  body('title')
    .isString()
    .trim()
    .notEmpty()
    .custom((title: string) => Buffer.byteLength(title, 'utf8') <= MAX_TITLE_BYTES)
    .withMessage(`title must be at most ${MAX_TITLE_BYTES} bytes`),
  body('language').optional().isString().matches(LANGUAGE).withMessage('invalid language code'),
];

const parameterBody = [
  body('parameters').optional().isObject(),
  body('parameters.length').optional().isIn([...STORY_LENGTHS]),
  body('parameters.sceneCount').optional().isInt({ min: 1, max: MAX_SCENES }),
  body('parameters.artStyle').optional().isString().trim().notEmpty().isLength({ max: 64 }),
  body('parameters.audience').optional().isIn([...AUDIENCES]),
  body('parameters.educationLevel').optional().isIn([...EDUCATION_LEVELS]),
  body('parameters.narrationStyle').optional().isIn([...NARRATION_STYLES]),
  body('parameters.voiceTone').optional().isIn([...VOICE_TONES]),
];

export const validateAdvance = [
  ...topicBody,
  ...parameterBody,
  body('targetStage').isIn([...TARGET_STAGES]).withMessage(`targetStage must be one of ${TARGET_STAGES.join(', ')}`),
  body('force').optional().isBoolean({ strict: true }),
  handleValidation,
];

export const validateStatus = [...topicBody, ...parameterBody, handleValidation];

export const validateExport = [
  ...topicBody,
  ...parameterBody,
  body('format').optional().isIn(['json', 'markdown']),
  handleValidation,
];

export const validateNarrationRegenerate = [
  ...topicBody,
  ...parameterBody,
  body('sceneIndex').isInt({ min: 1, max: MAX_SCENES }).toInt(),
  body('context').optional().isString().isLength({ max: 2000 }),
  handleValidation,
];

const topicParams = [
  param('language').matches(LANGUAGE).withMessage('invalid language code'),
  param('title').isString().notEmpty(),
];

export const validateRecordList = [...topicParams, handleValidation];

export const validateRecordGet = [
  ...topicParams,
  param('stage').isIn([...STAGE_ORDER]),
  param('fingerprint').matches(/^[a-f0-9]{8,64}$/),
  handleValidation,
];

export const validateImageGet = [
  ...topicParams,
  param('fingerprint').matches(/^[a-f0-9]{8,64}$/),
  param('sceneIndex').isInt({ min: 1, max: MAX_SCENES }),
  handleValidation,
];
