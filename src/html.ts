/**
 * Tag-level HTML scanning and in-place attribute edits
 *
 * Only opening tags whose names are requested are surfaced. Edits are
 * spliced into the source text: a written attribute has only its value
 * replaced, new attributes are inserted after the last existing one, and
 * every other byte of the fragment, inside modified tags included, is
 * copied through. Written values are double-quoted and escaped.
 *
 * Tokenizing is done by htmlparser2, so raw-text elements (script, style,
 * textarea, title) and comments are never mistaken for markup.
 */

import { Parser } from 'htmlparser2';
import { decodeHTMLAttribute, escapeAttribute } from 'entities';

interface ParsedAttribute {
  name: string;
  /** Raw source text of the value (entities not decoded) */
  raw: string;
  /** Quote character; undefined for a valueless attribute, null when unquoted */
  quote: string | null | undefined;
}

interface SourceAttribute extends ParsedAttribute {
  /** Offset just past the name within the tag source */
  nameEnd: number;
  /** Offsets of the value, quotes included; both equal nameEnd when valueless */
  valueStart: number;
  valueEnd: number;
  /** Decoded replacement value set by the visitor */
  written?: string;
}

const isHtmlSpace = (char: string) => char === ' ' || char === '\t' || char === '\n' || char === '\f' || char === '\r';

function skipWhile(source: string, index: number, test: (char: string) => boolean): number {
  let cursor = index;
  while (cursor < source.length && test(source.charAt(cursor))) {
    cursor += 1;
  }
  return cursor;
}

/**
 * Find the source span of every parsed attribute, in order
 *
 * Follows the tokenizer: attributes are separated by whitespace or '/',
 * and '=' may be surrounded by whitespace. Returns null when the parsed
 * attributes cannot be matched against the source text.
 */
function locateAttributes(source: string, from: number, parsed: ParsedAttribute[]): SourceAttribute[] | null {
  const located: SourceAttribute[] = [];
  let cursor = from;

  for (const attr of parsed) {
    const nameStart = skipWhile(source, cursor, char => char === '/' || isHtmlSpace(char));
    if (!source.startsWith(attr.name, nameStart)) {
      return null;
    }

    const nameEnd = nameStart + attr.name.length;
    if (attr.quote === undefined) {
      located.push({ ...attr, nameEnd, valueStart: nameEnd, valueEnd: nameEnd });
      cursor = nameEnd;
      continue;
    }

    const equals = skipWhile(source, nameEnd, isHtmlSpace);
    if (source.charAt(equals) !== '=') {
      return null;
    }

    const valueStart = skipWhile(source, equals + 1, isHtmlSpace);
    const quote = attr.quote ?? '';
    const value = quote + attr.raw + quote;
    if (!source.startsWith(value, valueStart)) {
      return null;
    }

    located.push({ ...attr, nameEnd, valueStart, valueEnd: valueStart + value.length });
    cursor = valueStart + value.length;
  }

  return located;
}

export class ScannedTag {
  /** Lower-cased tag name */
  readonly name: string;
  private readonly source: string;
  private readonly attributes: SourceAttribute[];
  private readonly added: Array<{ name: string; value: string }> = [];
  /** Where new attributes go: after the last attribute, or after the name */
  private readonly insertAt: number;
  private dirty = false;

  private constructor(source: string, name: string, attributes: SourceAttribute[], insertAt: number) {
    this.source = source;
    this.name = name;
    this.attributes = attributes;
    this.insertAt = insertAt;
  }

  /**
   * Scan one opening tag; null when its attributes cannot be located
   */
  static parse(source: string, parsed: ParsedAttribute[]): ScannedTag | null {
    const rawName = /^<([^\s/>]+)/.exec(source)?.[1];
    if (!rawName) {
      return null;
    }

    const nameEnd = 1 + rawName.length;
    const attributes = locateAttributes(source, nameEnd, parsed);
    if (!attributes) {
      return null;
    }

    const last = attributes[attributes.length - 1];
    return new ScannedTag(source, rawName.toLowerCase(), attributes, last ? last.valueEnd : nameEnd);
  }

  private find(name: string): SourceAttribute | undefined {
    const lower = name.toLowerCase();
    return this.attributes.find(attr => attr.name.toLowerCase() === lower);
  }

  private findAdded(name: string): { name: string; value: string } | undefined {
    const lower = name.toLowerCase();
    return this.added.find(attr => attr.name.toLowerCase() === lower);
  }

  hasAttribute(name: string): boolean {
    return this.find(name) !== undefined || this.findAdded(name) !== undefined;
  }

  /**
   * Decoded attribute value; '' for a valueless attribute, null when absent
   */
  getAttribute(name: string): string | null {
    const attr = this.find(name);
    if (attr) {
      return attr.written ?? decodeHTMLAttribute(attr.raw);
    }
    return this.findAdded(name)?.value ?? null;
  }

  setAttribute(name: string, value: string): void {
    const attr = this.find(name);
    const added = attr ? undefined : this.findAdded(name);
    if (attr) {
      attr.written = value;
    } else if (added) {
      added.value = value;
    } else {
      this.added.push({ name, value });
    }
    this.dirty = true;
  }

  get modified(): boolean {
    return this.dirty;
  }

  /**
   * The tag source with written values spliced in and new attributes
   * inserted; every other byte is copied through
   */
  serialize(): string {
    let html = '';
    let cursor = 0;

    for (const attr of this.attributes) {
      if (attr.written === undefined) {
        continue;
      }

      const value = `"${escapeAttribute(attr.written)}"`;
      if (attr.quote === undefined) {
        html += this.source.slice(cursor, attr.nameEnd) + '=' + value;
      } else {
        html += this.source.slice(cursor, attr.valueStart) + value;
      }
      cursor = attr.valueEnd;
    }

    html += this.source.slice(cursor, this.insertAt);
    for (const attr of this.added) {
      html += ` ${attr.name}="${escapeAttribute(attr.value)}"`;
    }

    return html + this.source.slice(this.insertAt);
  }
}

export type TagVisitor = (tag: ScannedTag) => void;

/**
 * Visit every opening tag named in `tagNames` and splice modified tags
 * back into the fragment
 */
export function rewriteTags(
  html: string,
  tagNames: ReadonlySet<string>,
  visit: TagVisitor
): string {
  const edits: Array<{ start: number; end: number; text: string }> = [];
  let attributes: ParsedAttribute[] = [];

  const parser = new Parser(
    {
      onopentagname() {
        attributes = [];
      },
      onattribute(name, value, quote) {
        attributes.push({ name, raw: value, quote });
      },
      onopentag(name, _attribs, isImplied) {
        if (isImplied || !tagNames.has(name)) {
          return;
        }

        const start = parser.startIndex;
        const end = parser.endIndex + 1;
        const source = html.slice(start, end);
        if (!source.startsWith('<') || !source.endsWith('>')) {
          return;
        }

        const tag = ScannedTag.parse(source, attributes);
        if (!tag) {
          return;
        }

        visit(tag);

        if (tag.modified) {
          edits.push({ start, end, text: tag.serialize() });
        }
      },
    },
    { decodeEntities: false, lowerCaseAttributeNames: false }
  );

  parser.end(html);

  if (edits.length === 0) {
    return html;
  }

  let output = '';
  let cursor = 0;
  for (const edit of edits) {
    output += html.slice(cursor, edit.start) + edit.text;
    cursor = edit.end;
  }

  return output + html.slice(cursor);
}
