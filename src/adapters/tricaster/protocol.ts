/**
 * TriCaster XML protocol.
 *
 * Parses dictionary responses into a small element tree and extracts DDR
 * timing from the two layouts firmware versions use:
 *
 *   <ddr index="1" file_duration="00:01:30.00" clip_framerate="25" />
 *   <ddr1 clip_seconds_elapsed="10.5" clip_seconds_remaining="79.5" />
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseFailureError } from '../../core/errors.js';
import { parseSeconds, parseTimecode } from '../../core/duration/duration.js';
import {
  DDR_COUNT,
  type SlotDuration,
  type SlotStatus,
  type TallyState,
  type XmlDocument,
  type XmlElement,
} from './types.js';

// ============================================================================
// Parsing
// ============================================================================

const ATTRIBUTES_KEY = ':@';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  preserveOrder: true,
  parseAttributeValue: false,
  parseTagValue: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [name, attr] of Object.entries(value)) {
    attributes[name] = typeof attr === 'string' ? attr : String(attr);
  }
  return attributes;
}

/**
 * Convert fast-xml-parser's ordered output into elements.
 * Text, comments and processing instructions are dropped.
 */
function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) {
    return [];
  }

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const tag = Object.keys(node).find(
      (key) => key !== ATTRIBUTES_KEY && !key.startsWith('#') && !key.startsWith('?')
    );
    if (tag === undefined) {
      continue;
    }
    elements.push({
      tag,
      attributes: toAttributes(node[ATTRIBUTES_KEY]),
      children: toElements(node[tag]),
    });
  }
  return elements;
}

/**
 * Parse a dictionary response body.
 *
 * @throws ParseFailureError if the body is not well-formed XML
 */
export function parseXmlDocument(text: string): XmlDocument {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new ParseFailureError(
      'tricaster',
      `${validation.err.msg} (line ${validation.err.line})`
    );
  }

  const parsed: unknown = parser.parse(text);
  const root = toElements(parsed)[0];
  if (!root) {
    throw new ParseFailureError('tricaster', 'document has no root element');
  }

  return { root };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * First descendant (document order, root excluded) matching the predicate.
 */
export function findDescendant(
  root: XmlElement,
  predicate: (element: XmlElement) => boolean
): XmlElement | null {
  const stack = [...root.children].reverse();

  for (let element = stack.pop(); element !== undefined; element = stack.pop()) {
    if (predicate(element)) {
      return element;
    }
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child) {
        stack.push(child);
      }
    }
  }

  return null;
}

/**
 * Attribute value, or '' when absent.
 */
function attr(element: XmlElement, name: string): string {
  return element.attributes[name] ?? '';
}

function findIndexedDdr(root: XmlElement, slot: number): XmlElement | null {
  const index = String(slot);
  return findDescendant(root, (el) => el.tag === 'ddr' && el.attributes['index'] === index);
}

function findSuffixedDdr(root: XmlElement, slot: number): XmlElement | null {
  const tag = `ddr${slot}`;
  return findDescendant(root, (el) => el.tag === tag);
}

function readFramerate(element: XmlElement): number | null {
  return parseSeconds(attr(element, 'clip_framerate') || null);
}

function readDuration(element: XmlElement): number | null {
  return parseTimecode(attr(element, 'file_duration') || attr(element, 'duration') || null);
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Duration and framerate of one DDR's current clip.
 *
 * Tries the index-attribute layout, then the numbered-tag layout, and for
 * the numbered-tag layout only, elapsed + remaining when no duration is given.
 *
 * @returns null when no layout yields a duration
 */
export function extractSlotDuration(doc: XmlDocument, slot: number): SlotDuration | null {
  const indexed = findIndexedDdr(doc.root, slot);
  if (indexed) {
    const seconds = readDuration(indexed);
    if (seconds !== null) {
      return { seconds, framerate: readFramerate(indexed) };
    }
  }

  const suffixed = findSuffixedDdr(doc.root, slot);
  if (suffixed) {
    let seconds = readDuration(suffixed);
    if (seconds === null) {
      const elapsed = parseSeconds(attr(suffixed, 'clip_seconds_elapsed') || null);
      const remaining = parseSeconds(attr(suffixed, 'clip_seconds_remaining') || null);
      if (elapsed !== null && remaining !== null) {
        seconds = elapsed + remaining;
      }
    }
    if (seconds !== null) {
      return { seconds, framerate: readFramerate(suffixed) };
    }
  }

  return null;
}

/**
 * Raw status of every DDR present in the document, keyed "ddr1".."ddr4".
 */
export function extractSlotStatuses(doc: XmlDocument): Record<string, SlotStatus> {
  const statuses: Record<string, SlotStatus> = {};

  for (let slot = 1; slot <= DDR_COUNT; slot++) {
    const element = findIndexedDdr(doc.root, slot) ?? findSuffixedDdr(doc.root, slot);
    if (!element) {
      continue;
    }
    statuses[`ddr${slot}`] = {
      duration: attr(element, 'file_duration') || attr(element, 'duration') || null,
      elapsed: attr(element, 'clip_seconds_elapsed') || null,
      remaining: attr(element, 'clip_seconds_remaining') || null,
      framerate: attr(element, 'clip_framerate') || null,
      playing: attr(element, 'playing') === 'true',
      filename: attr(element, 'filename') || attr(element, 'clip_name') || null,
    };
  }

  return statuses;
}

/**
 * Sources currently on program and preview.
 * Models flag these with either on_pgm/on_pvw or program/preview attributes.
 */
export function extractTally(doc: XmlDocument): TallyState {
  const tally: TallyState = { program: [], preview: [] };
  const stack: XmlElement[] = [doc.root];

  for (let element = stack.pop(); element !== undefined; element = stack.pop()) {
    const label = element.tag || attr(element, 'name') || 'unknown';
    if (attr(element, 'on_pgm') === 'true' || attr(element, 'program') === 'true') {
      tally.program.push(label);
    }
    if (attr(element, 'on_pvw') === 'true' || attr(element, 'preview') === 'true') {
      tally.preview.push(label);
    }
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child) {
        stack.push(child);
      }
    }
  }

  return tally;
}

// ============================================================================
// Shortcut Commands
// ============================================================================

function escapeXmlAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/'/g, '&apos;')
    .replace(/"/g, '&quot;');
}

/**
 * Build the XML body of a shortcut command.
 */
export function formatShortcut(name: string, params: Readonly<Record<string, string>> = {}): string {
  const entries = Object.entries(params)
    .map(([key, value]) => `<entry key='${escapeXmlAttribute(key)}' value='${escapeXmlAttribute(value)}'/>`)
    .join('');
  return `<shortcut name='${escapeXmlAttribute(name)}'>${entries}</shortcut>`;
}
