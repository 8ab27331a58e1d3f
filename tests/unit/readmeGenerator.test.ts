import { describe, expect, it, vi } from 'vitest';
import {
  ReadmeGenerator,
  buildReadmePrompt,
  formatResult,
  generate,
} from '../../src/lib/readme-generator';
import { DEFAULT_GEMINI_MODEL, GeminiProvider } from '../../src/lib/providers';
import { UserError } from '../../src/types';

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('buildReadmePrompt', () => {
  it('embeds the description as a contiguous quoted substring', () => {
    const description = 'A CLI that brews coffee while your tests run';

    const prompt = buildReadmePrompt(description);

    expect(prompt).toContain(`Project Description: "${description}"`);
    expect(prompt.endsWith(`"${description}"`)).toBe(true);
  });

  it('asks for every README section', () => {
    const prompt = buildReadmePrompt('anything');

    expect(prompt.startsWith('You are a professional GitHub project assistant.')).toBe(true);
    expect(prompt).toContain('1.  A clear and catchy title.');
    expect(prompt).toContain('2.  A brief but engaging description.');
    expect(prompt).toContain('3.  A "Features" section using a bulleted list.');
    expect(prompt).toContain(
      '4.  A "Getting Started" section with instructions for installation and usage.',
    );
    expect(prompt).toContain('5.  A "Contributing" section.');
    expect(prompt).toContain('6.  A "License" section.');
  });

  it('keeps the inner indentation of the instructions', () => {
    const prompt = buildReadmePrompt('anything');

    expect(prompt).toContain('README.md file\n    for a new software project.');
    expect(prompt).toContain('\n    6.  A "License" section.\n\n    Based on the following');
    expect(prompt).toContain('README content.\n    \n    Project Description: "anything"');
  });

  it('does not escape quotes, braces or newlines in the description', () => {
    const description = 'Say "hi" to {everyone}\nand more';

    expect(buildReadmePrompt(description)).toContain(
      'Project Description: "Say "hi" to {everyone}\nand more"',
    );
  });
});

describe('formatResult', () => {
  it('returns generated text untouched', () => {
    expect(formatResult({ ok: true, text: '# Title\n' })).toBe('# Title\n');
  });

  it('prefixes transport failures', () => {
    expect(formatResult({ ok: false, kind: 'transport', reason: 'HTTP 503' })).toBe(
      'Error connecting to the API: HTTP 503',
    );
  });

  it('prefixes response-shape failures', () => {
    expect(
      formatResult({ ok: false, kind: 'response-shape', reason: "Missing 'candidates'." }),
    ).toBe("Error parsing API response: The response structure is invalid. Missing 'candidates'.");
  });
});

describe('ReadmeGenerator', () => {
  it('validates the provider config on construction', () => {
    const provider = new GeminiProvider({ name: 'gemini', apiKey: 'test-secret', model: '' });

    expect(() => new ReadmeGenerator(provider)).toThrow(UserError);
  });

  it('sends the rendered prompt and returns the structured result', async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({ candidates: [{ content: { parts: [{ text: '# Brew' }] } }] }),
    );
    const generator = new ReadmeGenerator(
      new GeminiProvider({ name: 'gemini', apiKey: 'test-secret', model: DEFAULT_GEMINI_MODEL }),
    );

    const result = await generator.generate('Coffee CLI');

    expect(result).toEqual({ ok: true, text: '# Brew' });
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toEqual({ contents: [{ parts: [{ text: buildReadmePrompt('Coffee CLI') }] }] });
  });
});

describe('generate', () => {
  it('returns the generated markdown', async () => {
    stubFetch(async () =>
      jsonResponse({ candidates: [{ content: { parts: [{ text: '# Hello' }] } }] }),
    );

    await expect(generate('A greeting tool', 'test-secret')).resolves.toBe('# Hello');
  });

  it('returns a connection error string for a 500 response', async () => {
    stubFetch(async () => jsonResponse({}, 500));

    const output = await generate('A greeting tool', 'test-secret');

    expect(output.startsWith('Error connecting to the API:')).toBe(true);
  });

  it('returns a parsing error string for an empty object body', async () => {
    stubFetch(async () => jsonResponse({}));

    await expect(generate('A greeting tool', 'test-secret')).resolves.toBe(
      "Error parsing API response: The response structure is invalid. Missing 'candidates'.",
    );
  });

  it('returns a connection error string when the network call fails', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(generate('A greeting tool', 'test-secret')).resolves.toBe(
      'Error connecting to the API: fetch failed',
    );
  });

  it('returns within the timeout when the endpoint never answers', async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('expected an abort signal'));
            return;
          }
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );

    await expect(generate('A greeting tool', 'test-secret', { timeoutMs: 25 })).resolves.toBe(
      'Error connecting to the API: Request timed out after 25ms',
    );
  });

  it('targets the requested model', async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] }),
    );

    await generate('A greeting tool', 'test-secret', { model: 'gemini-2.0-flash' });

    expect(String(fetchMock.mock.calls[0][0])).toContain('/models/gemini-2.0-flash:generateContent');
  });
});
