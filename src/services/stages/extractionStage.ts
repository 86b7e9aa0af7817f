import { ContentSource, WikiArticle } from '../../types/content';
import { ArticleContent, StageResult, Topic } from '../../types/stage';
import { ArticleNotFoundError } from '../../utils/pipelineErrors';

const HEADING = /^(={2,6})\s*(.+?)\s*\1$/;

// Back matter cut from the end of an article
const TRAILING_SECTIONS = new Set([
  'references',
  'external links',
  'see also',
  'further reading',
  'notes',
  'bibliography',
  'sources',
]);

export type ExtractionOutcome =
  | { kind: 'article'; result: StageResult<'extraction'> }
  | { kind: 'disambiguation'; candidates: string[] };

interface Section {
  level: number;
  title: string;
  lines: string[];
}

function splitSections(text: string): { lead: string[]; sections: Section[] } {
  const lead: string[] = [];
  const sections: Section[] = [];
  for (const line of text.split('\n')) {
    const heading = line.trim().match(HEADING);
    if (heading) {
      sections.push({ level: heading[1].length, title: heading[2], lines: [] });
    } else if (sections.length) {
      sections[sections.length - 1].lines.push(line);
    } else {
      lead.push(line);
    }
  }
  return { lead, sections };
}

function hasText(lines: string[]): boolean {
  return lines.some((line) => line.trim() !== '');
}

function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Cleans a plain-text extract: unified line endings, no trailing whitespace,
 * single blank lines, no empty sections, and no back matter (References, See also...).
 */
export function normalizeArticleText(extract: string): { summary: string; content: string; sections: string[] } {
  const unified = extract
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');
  const { lead, sections } = splitSections(unified);

  const cutAt = sections.findIndex((s) => s.level === 2 && TRAILING_SECTIONS.has(s.title.toLowerCase()));
  const kept = cutAt === -1 ? sections : sections.slice(0, cutAt);

  // A heading is empty when neither it nor any deeper subsection below it has text
  const nonEmpty = kept.filter((section, i) => {
    if (hasText(section.lines)) return true;
    for (let j = i + 1; j < kept.length && kept[j].level > section.level; j++) {
      if (hasText(kept[j].lines)) return true;
    }
    return false;
  });

  const summary = collapseBlankLines(lead.join('\n'));
  const parts = [summary];
  for (const section of nonEmpty) {
    const marks = '='.repeat(section.level);
    parts.push(`${marks} ${section.title} ${marks}\n${collapseBlankLines(section.lines.join('\n'))}`.trim());
  }

  return {
    summary,
    content: collapseBlankLines(parts.filter(Boolean).join('\n\n')),
    sections: nonEmpty.map((section) => section.title),
  };
}

export function toArticleContent(article: WikiArticle): ArticleContent {
  const normalized = normalizeArticleText(article.extract);
  return {
    title: article.title,
    language: article.language,
    pageId: article.pageId,
    url: article.url,
    summary: normalized.summary,
    content: normalized.content,
    sections: normalized.sections,
    candidates: [],
  };
}

export async function executeExtraction(topic: Topic, source: ContentSource): Promise<ExtractionOutcome> {
  const fetched = await source.fetch(topic.title, topic.language);
  switch (fetched.kind) {
    case 'not-found':
      throw new ArticleNotFoundError(topic.title, topic.language);
    case 'disambiguation':
      return { kind: 'disambiguation', candidates: fetched.candidates };
    case 'article': {
      const payload = toArticleContent(fetched.article);
      if (!payload.content) {
        throw new ArticleNotFoundError(topic.title, topic.language);
      }
      return { kind: 'article', result: { payload, status: 'ok' } };
    }
  }
}
