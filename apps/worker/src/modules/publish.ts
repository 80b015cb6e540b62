import type { EventRecord } from '@since-sean-left/shared';

export const EVENTS_ANCHOR = 'const events = [';

// Escaped quotes inside the literal do not end the match.
const TITLE_PATTERN = /title:\s*(?:'((?:\\.|[^'\\])+)'|"((?:\\.|[^"\\])+)")/g;

function unescapeLiteral(value: string): string {
  return value.replace(/\\(.)/g, (_escape: string, char: string) => (char === 'n' ? ' ' : char));
}

export function extractExistingTitles(document: string): string[] {
  return Array.from(document.matchAll(TITLE_PATTERN), (match) => unescapeLiteral(match[1] ?? match[2] ?? ''))
    .filter(Boolean);
}

/**
 * Renders one record as an object literal in the page's events array.
 * Title and description must already be escaped for single quotes.
 */
export function renderEvent(event: EventRecord): string {
  const tags = event.tags.map((tag) => `'${tag}'`).join(', ');
  return [
    '            {',
    `                date: '${event.date}',`,
    `                title: '${event.title}',`,
    `                desc: '${event.desc}',`,
    `                tags: [${tags}]`,
    '            }'
  ].join('\n');
}

/**
 * Inserts the records directly after the first occurrence of `anchor`,
 * ahead of whatever the array already holds. With no records the document
 * is returned as is.
 */
export function injectEvents(document: string, events: readonly EventRecord[], anchor: string = EVENTS_ANCHOR): string {
  if (events.length === 0) {
    return document;
  }

  const block = events.map(renderEvent).join(',\n');

  // replacer function: "$&" and friends in record text stay literal
  return document.replace(anchor, () => `${anchor}\n${block},`);
}
