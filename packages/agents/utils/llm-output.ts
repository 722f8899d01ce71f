// Helpers for reading model replies: JSON first, labelled text sections as fallback

import type { z } from 'zod';

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;
const ANY_HEADER = /^\s*(?:#+\s*)?\**[A-Z][A-Za-z -]{0,40}\**\s*:/;
const BULLET = /^\s*(?:[-*•]|\d+[.)])\s+/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function headerPattern(label: string): RegExp {
  return new RegExp(`^\\s*(?:#+\\s*)?\\**${escapeRegExp(label)}\\**\\s*:\\s*\\**\\s*(.*)$`, 'i');
}

/** Pull the first JSON object out of a reply (fenced block or outermost braces) */
export function extractJson(text: string): unknown {
  const candidates: string[] = [];
  const fenced = FENCED_JSON.exec(text);
  if (fenced?.[1]) candidates.push(fenced[1].trim());
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}

/** Validated JSON payload, or null when the reply carries none */
export function parseJsonReply<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> | null {
  const json = extractJson(text);
  if (json === undefined) return null;
  const parsed = schema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Text following `Label:` up to the next header line.
 * Returns '' when the label is absent.
 */
export function extractSection(text: string, label: string): string {
  const header = headerPattern(label);
  const out: string[] = [];
  let inside = false;

  for (const line of text.split(/\r?\n/)) {
    if (!inside) {
      const m = header.exec(line);
      if (m) {
        inside = true;
        const rest = (m[1] ?? '').replace(/\**$/, '').trim();
        if (rest) out.push(rest);
      }
      continue;
    }
    if (ANY_HEADER.test(line)) break;
    out.push(line);
  }

  return out.join('\n').trim();
}

/** Bullet or numbered items under `Label:`, markers stripped */
export function extractList(text: string, label: string): string[] {
  return extractSection(text, label)
    .split(/\r?\n/)
    .map(line => line.replace(BULLET, '').trim())
    .filter(line => line.length > 0);
}

/** Split a reply into blocks that each start with a `Label:` line */
export function splitBlocks(text: string, label: string): string[] {
  const header = headerPattern(label);
  const blocks: string[] = [];
  let current: string[] | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (header.test(line)) {
      if (current) blocks.push(current.join('\n'));
      current = [line];
    } else if (current) {
      current.push(line);
    }
  }
  if (current) blocks.push(current.join('\n'));
  return blocks;
}

/** Trim to at most `max` characters, preferring a sentence boundary */
export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  const cut = text.slice(0, max);
  const sentenceEnd = Math.max(cut.lastIndexOf('. '), cut.lastIndexOf('! '), cut.lastIndexOf('? '));
  if (sentenceEnd >= max * 0.5) return cut.slice(0, sentenceEnd + 1);
  const wordEnd = cut.lastIndexOf(' ');
  return (wordEnd > 0 ? cut.slice(0, wordEnd) : cut.slice(0, Math.max(0, max - 1))).trimEnd() + '…';
}
