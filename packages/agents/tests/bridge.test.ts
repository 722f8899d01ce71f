import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLlmClient, classifyLlmError } from '../bridge/llm-client.js';
import { createSpeechClient, OPENAI_SPEECH_URL } from '../bridge/speech-client.js';
import { TransientError, PermanentError } from '../orchestrator/errors.js';

describe('createLlmClient', () => {
  it('returns null without an API key', () => {
    expect(createLlmClient({ model: 'test-model' })).toBeNull();
  });

  it('exposes the configured model', () => {
    expect(createLlmClient({ apiKey: 'test-key', model: 'test-model' })?.model).toBe('test-model');
  });
});

describe('classifyLlmError', () => {
  it('treats connection failures as transient', () => {
    const err = new Anthropic.APIConnectionError({ message: 'socket hang up' });
    expect(classifyLlmError(err)).toBeInstanceOf(TransientError);
  });

  it('treats rate limits and overload as transient', () => {
    expect(classifyLlmError(new Anthropic.APIError(429, undefined, 'slow down', undefined))).toBeInstanceOf(TransientError);
    expect(classifyLlmError(new Anthropic.APIError(529, undefined, 'overloaded', undefined))).toBeInstanceOf(TransientError);
    expect(classifyLlmError(new Anthropic.APIError(500, undefined, 'oops', undefined))).toBeInstanceOf(TransientError);
  });

  it('treats client errors as permanent', () => {
    expect(classifyLlmError(new Anthropic.APIError(400, undefined, 'bad request', undefined))).toBeInstanceOf(PermanentError);
    expect(classifyLlmError(new Anthropic.APIError(401, undefined, 'bad key', undefined))).toBeInstanceOf(PermanentError);
  });

  it('treats anything else as permanent and keeps the cause', () => {
    const cause = new Error('weird');
    const classified = classifyLlmError(cause);
    expect(classified).toBeInstanceOf(PermanentError);
    expect(classified.message).toBe('LLM request failed: weird');
    expect(classified.cause).toBe(cause);
  });
});

describe('createSpeechClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'newsdesk-speech-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null without an API key', () => {
    expect(createSpeechClient({})).toBeNull();
  });

  it('posts the script and writes the audio file', async () => {
    const fetchMock = vi.fn(async () => new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = createSpeechClient({ apiKey: 'test-key' });
    const outPath = join(dir, 'nested', 'briefing.mp3');

    const result = await client?.synthesize('Hello there.', 'echo', outPath);

    expect(result).toEqual({ path: outPath, bytes: 3, voice: 'echo' });
    expect([...(await readFile(outPath))]).toEqual([1, 2, 3]);
    expect(fetchMock).toHaveBeenCalledWith(OPENAI_SPEECH_URL, expect.objectContaining({
      method: 'POST',
      body: JSON.stringify({ model: 'tts-1', input: 'Hello there.', voice: 'echo', response_format: 'mp3' }),
    }));
  });

  it('classifies HTTP failures', async () => {
    const client = createSpeechClient({ apiKey: 'test-key' });
    const outPath = join(dir, 'x.mp3');

    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));
    await expect(client?.synthesize('x', 'alloy', outPath)).rejects.toBeInstanceOf(TransientError);

    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 400 })));
    await expect(client?.synthesize('x', 'alloy', outPath)).rejects.toThrow('Speech request failed (400): nope');
  });

  it('treats network errors as transient', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
    const client = createSpeechClient({ apiKey: 'test-key' });
    await expect(client?.synthesize('x', 'alloy', join(dir, 'y.mp3'))).rejects.toThrow('Speech request failed: fetch failed');
  });
});
