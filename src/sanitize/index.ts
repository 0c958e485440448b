export { TextSanitizer, sanitizeText, DROP_PATTERNS } from './text-sanitizer.js';
export type { SanitizerOptions } from './text-sanitizer.js';
