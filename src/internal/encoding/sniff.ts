export interface EncodingSniffOptions {
  readonly transportEncodingLabel?: string;
  readonly defaultEncoding?: string;
}

export type EncodingSniffSource = "bom" | "transport" | "default";

export interface EncodingSniffResult {
  readonly encoding: string;
  readonly source: EncodingSniffSource;
}

export interface DecodedMarkup {
  readonly text: string;
  readonly sniff: EncodingSniffResult;
}

const DEFAULT_ENCODING = "utf-8";

const WINDOWS_1252_ALIASES = new Set([
  "iso-8859-1",
  "iso8859-1",
  "latin1",
  "latin-1",
  "us-ascii"
]);

function detectBom(bytes: Uint8Array): string | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return "utf-8";
  }

  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }

  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }

  return null;
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (
    (trimmed.startsWith("\"") && trimmed.endsWith("\"")) ||
    (trimmed.startsWith("'") && trimmed.endsWith("'"))
  ) {
    return trimmed.slice(1, -1).trim();
  }

  return trimmed;
}

export function canonicalizeEncodingLabel(label: string): string | null {
  const normalized = stripQuotes(label).toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  if (WINDOWS_1252_ALIASES.has(normalized)) {
    return "windows-1252";
  }

  try {
    return new TextDecoder(normalized).encoding.toLowerCase();
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }
}

export function sniffMarkupEncoding(bytes: Uint8Array, options: EncodingSniffOptions = {}): EncodingSniffResult {
  const bom = detectBom(bytes);
  if (bom) {
    return { encoding: bom, source: "bom" };
  }

  if (options.transportEncodingLabel) {
    const transport = canonicalizeEncodingLabel(options.transportEncodingLabel);
    if (transport) {
      return { encoding: transport, source: "transport" };
    }
  }

  const defaultEncoding = canonicalizeEncodingLabel(options.defaultEncoding ?? DEFAULT_ENCODING) ?? DEFAULT_ENCODING;
  return { encoding: defaultEncoding, source: "default" };
}

// TextDecoder drops a leading BOM that matches the chosen encoding.
export function decodeMarkupBytes(bytes: Uint8Array, options: EncodingSniffOptions = {}): DecodedMarkup {
  const sniff = sniffMarkupEncoding(bytes, options);
  const decoder = new TextDecoder(sniff.encoding);
  return {
    text: decoder.decode(bytes),
    sniff
  };
}
