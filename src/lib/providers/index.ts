export { IAiProvider } from './provider.interface';
export {
  DEFAULT_GEMINI_MODEL,
  MAX_TIMEOUT_MS,
  GeminiProvider,
  extractCandidateText,
} from './gemini/gemini-provider';
export type { GeminiProviderConfig } from './gemini/gemini-provider';
