import type { TranscriptSegment } from '../../types/transcript';

export const FORMATTING_TAGS = [
  'strong',
  'em',
  'b',
  'i',
  'mark',
  'small',
  'del',
  'ins',
  'sub',
  'sup'
];

const ALL_TAGS = /<[^>]*>/gi;
const NON_FORMATTING_TAGS = new RegExp(`<\\/?(?!\\/?(?:${FORMATTING_TAGS.join('|')})\\b)[^>]*>`, 'gi');

const TEXT_ELEMENT = /<text\b([^>]*?)(?:\/>|>([\s\S]*?)<\/text>)/g;
const ATTRIBUTE = /([\w-]+)="([^"]*)"/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0'
};

export class CaptionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptionParseError';
  }
}

export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const codePoint = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE)) {
    attributes.set(match[1], decodeEntities(match[2]));
  }
  return attributes;
}

function parseSeconds(value: string | undefined, name: string): number {
  const seconds = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(seconds)) {
    throw new CaptionParseError(`Caption element has an invalid ${name} attribute: ${value ?? '(missing)'}`);
  }
  return seconds;
}

/**
 * Parses YouTube's timedtext XML into segments.
 *
 * Element text is entity-decoded twice, once for the XML layer and once for
 * the HTML that YouTube escapes inside it. Markup is stripped afterwards;
 * with `preserveFormatting` the tags in {@link FORMATTING_TAGS} are kept.
 */
export function parseTimedText(xml: string, preserveFormatting = false): TranscriptSegment[] {
  const tagPattern = preserveFormatting ? NON_FORMATTING_TAGS : ALL_TAGS;
  const segments: TranscriptSegment[] = [];

  for (const match of xml.matchAll(TEXT_ELEMENT)) {
    const inner = match[2];
    if (!inner) continue;

    const attributes = parseAttributes(match[1]);
    const text = decodeEntities(decodeEntities(inner)).replace(tagPattern, '');

    segments.push({
      text,
      start: parseSeconds(attributes.get('start'), 'start'),
      duration: attributes.has('dur') ? parseSeconds(attributes.get('dur'), 'dur') : 0
    });
  }

  return segments;
}
