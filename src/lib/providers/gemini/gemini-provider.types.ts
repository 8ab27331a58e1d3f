export interface GeminiRequest {
  contents: Array<{
    parts: Array<{
      text: string;
    }>;
  }>;
}

/** Path to the generated text inside a `generateContent` response body. */
export const CANDIDATE_TEXT_PATH = ['candidates', 0, 'content', 'parts', 0, 'text'] as const;

export type ExtractResult = { ok: true; text: string } | { ok: false; reason: string };
