import { PolicySectionTable } from './types';

const HEADING_MARKER = '###';

/**
 * Split a markdown document into sections keyed by `###` heading.
 *
 * A section's body runs from the line after its heading to the line before the
 * next heading (or end of document) and is trimmed. Keys are lowercased so
 * lookups are case-insensitive. A repeated heading keeps its first body.
 */
export function parseSections(document: string): PolicySectionTable {
  const sections: PolicySectionTable = new Map();
  let currentKey: string | undefined;
  let currentLines: string[] = [];

  const flush = (): void => {
    if (currentKey !== undefined && !sections.has(currentKey)) {
      sections.set(currentKey, currentLines.join('\n').trim());
    }
  };

  for (const line of document.split(/\r?\n/)) {
    if (line.startsWith(HEADING_MARKER)) {
      flush();
      currentKey = normalizeHeading(line.replace(/^#+/, ''));
      currentLines = [];
    } else if (currentKey !== undefined) {
      currentLines.push(line);
    }
  }
  flush();

  return sections;
}

export function normalizeHeading(heading: string): string {
  return heading.trim().toLowerCase();
}
