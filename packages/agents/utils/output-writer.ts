// Writes briefings under <outputDir>/<YYYY-MM-DD>/briefing_<category>_<unix>.<ext>

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AggregatedReport } from '../types/run.js';

export interface SaveBriefingOptions {
  outputDir: string;
  category: string;
  markdown: string;
  report: AggregatedReport;
  now?: Date;
}

export interface SavedBriefing {
  markdownPath: string;
  jsonPath: string;
}

export function safeFileSegment(value: string): string {
  const cleaned = value.toLowerCase().replace(/[^a-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || 'briefing';
}

/** Dated path for a briefing artifact; the date folder uses UTC */
export function briefingPath(outputDir: string, category: string, now: Date, ext: string): string {
  const day = now.toISOString().slice(0, 10);
  const unix = Math.floor(now.getTime() / 1000);
  return join(outputDir, day, `briefing_${safeFileSegment(category)}_${unix}.${ext}`);
}

export async function saveBriefing(options: SaveBriefingOptions): Promise<SavedBriefing> {
  const { outputDir, category, markdown, report, now = new Date() } = options;
  const markdownPath = briefingPath(outputDir, category, now, 'md');
  const jsonPath = briefingPath(outputDir, category, now, 'json');

  await mkdir(join(outputDir, now.toISOString().slice(0, 10)), { recursive: true });
  await writeFile(markdownPath, markdown, 'utf8');
  await writeFile(jsonPath, JSON.stringify(report, null, 2) + '\n', 'utf8');

  return { markdownPath, jsonPath };
}
