// Speech client — OpenAI text-to-speech endpoint, writes an mp3 to disk

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TransientError, PermanentError } from '../orchestrator/errors.js';
import { errorMessage } from '../utils/logger.js';

export const OPENAI_SPEECH_URL = 'https://api.openai.com/v1/audio/speech';

export interface SpeechClientConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}

export interface SpeechResult {
  path: string;
  bytes: number;
  voice: string;
}

export interface SpeechClient {
  synthesize(text: string, voice: string, outPath: string, signal?: AbortSignal): Promise<SpeechResult>;
}

/**
 * Returns null if no API key is configured.
 */
export function createSpeechClient(config: SpeechClientConfig): SpeechClient | null {
  const { apiKey, model = 'tts-1', baseUrl = OPENAI_SPEECH_URL } = config;
  if (!apiKey) return null;

  return {
    async synthesize(text, voice, outPath, signal) {
      let res: Response;
      try {
        res = await fetch(baseUrl, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ model, input: text, voice, response_format: 'mp3' }),
          signal,
        });
      } catch (err) {
        throw new TransientError(
          `Speech request failed: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        const message = `Speech request failed (${res.status}): ${body.slice(0, 200)}`;
        if (res.status === 429 || res.status >= 500) throw new TransientError(message);
        throw new PermanentError(message);
      }

      const audio = Buffer.from(await res.arrayBuffer());
      await mkdir(dirname(outPath), { recursive: true });
      await writeFile(outPath, audio);
      return { path: outPath, bytes: audio.length, voice };
    },
  };
}
