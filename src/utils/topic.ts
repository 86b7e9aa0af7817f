import { ApiError } from './errorHandler';
import { Topic } from '../types/stage';

const LANGUAGE_PATTERN = /^[a-z]{2,3}(-[a-z0-9]+)*$/;

export function normalizeTitle(raw: string): string {
  const collapsed = raw.replace(/_/g, ' ').replace(/\s+/g, ' ').trim();
  if (!collapsed) return collapsed;
  // MediaWiki titles are case-insensitive in their first character only
  return collapsed.charAt(0).toUpperCase() + collapsed.slice(1);
}

export function normalizeLanguage(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Builds the immutable identity of a pipeline run.
 * Throws a 400 ApiError for an empty title or a malformed language code.
 */
export function createTopic(title: string, language: string): Topic {
  const normalizedTitle = normalizeTitle(title);
  const normalizedLanguage = normalizeLanguage(language);
  if (!normalizedTitle) {
    throw new ApiError('title must be a non-empty string', 400);
  }
  if (!LANGUAGE_PATTERN.test(normalizedLanguage)) {
    throw new ApiError(`invalid language code "${language}"`, 400);
  }
  return Object.freeze({ title: normalizedTitle, language: normalizedLanguage });
}

/** Stable string identity, safe as a path segment or a Redis key part. */
export function topicKey(topic: Topic): string {
  return `${topic.language}:${encodeURIComponent(topic.title)}`;
}
