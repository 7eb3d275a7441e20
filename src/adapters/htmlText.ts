const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const codePoint = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isNaN(codePoint) ? entity : String.fromCodePoint(codePoint);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

interface ElementRange {
  start: number;
  contentStart: number;
  contentEnd: number;
  end: number;
}

// Locates every <div> whose opening tag contains `marker`, pairing nested <div>s so the whole element is captured.
function findDivs(html: string, marker: string): ElementRange[] {
  const ranges: ElementRange[] = [];
  let searchFrom = 0;

  for (;;) {
    const markerIndex = html.indexOf(marker, searchFrom);
    if (markerIndex === -1) break;

    const start = html.lastIndexOf('<div', markerIndex);
    const openEnd = html.indexOf('>', markerIndex);
    if (start === -1 || openEnd === -1) break;

    const tagPattern = /<div\b|<\/div\s*>/gi;
    tagPattern.lastIndex = openEnd + 1;
    let depth = 1;
    let contentEnd = html.length;
    let end = html.length;
    let match: RegExpExecArray | null;
    while ((match = tagPattern.exec(html)) !== null) {
      depth += match[0].startsWith('</') ? -1 : 1;
      if (depth === 0) {
        contentEnd = match.index;
        end = match.index + match[0].length;
        break;
      }
    }

    ranges.push({ start, contentStart: openEnd + 1, contentEnd, end });
    searchFrom = end;
  }

  return ranges;
}

export function extractDivs(html: string, marker: string): string[] {
  return findDivs(html, marker).map((range) => html.slice(range.contentStart, range.contentEnd));
}

export function removeDivs(html: string, marker: string): string {
  let result = '';
  let cursor = 0;
  for (const range of findDivs(html, marker)) {
    result += html.slice(cursor, range.start);
    cursor = range.end;
  }
  return result + html.slice(cursor);
}

export function htmlToText(html: string): string {
  const withBreaks = html.replace(/<br\s*\/?>/gi, '\n');
  const stripped = withBreaks.replace(/<[^>]+>/g, '');
  return decodeEntities(stripped)
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .trim();
}
