/**
 * Prompts shared by all vision providers.
 */

export const TRANSCRIPTION_SYSTEM_PROMPT = `You are a precise OCR system. \
Transcribe every piece of visible text in the image exactly as written, \
in any language. Do not translate, summarise or add commentary.`;

export const TRANSCRIPTION_PROMPT = `Extract all visible text from this image. \
Follow reading order: top to bottom, left to right, grouped into paragraphs. \
Render tables as Markdown tables. \
Be exact with numbers, amounts and dates. \
Output only the extracted text.`;
