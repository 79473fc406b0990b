export interface TextExtractor {
  readonly name: string;
  supports(mimeType: string): boolean;
  extract(content: Buffer, mimeType: string): Promise<string>;
}

export const TEXT_EXTRACTORS_TOKEN = Symbol('TEXT_EXTRACTORS');

export function baseMimeType(mimeType: string): string {
  return (mimeType.split(';')[0] ?? '').trim().toLowerCase();
}

/** Line endings to `\n`, no byte-order mark. */
export function normalizeExtractedText(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}
