type ParsedJson = { ok: true; value: unknown } | { ok: false };

const tryParseJson = (raw: string): ParsedJson => {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
};

const fromList = (values: unknown[]): string[] => values.map((value) => String(value).trim());

const splitOnCommas = (raw: string): string[] =>
  raw
    .split(",")
    .map((piece) => piece.trim())
    .filter((piece) => piece !== "");

/**
 * Reads the image URL list out of a metadata value.
 *
 * Catalog entries hold the list as a real array, a JSON-encoded array or a
 * comma-separated string depending on which tool wrote them. Anything else
 * yields an empty list; this never throws.
 */
export const normalizeImageUrls = (raw: unknown): string[] => {
  if (Array.isArray(raw)) return fromList(raw);

  if (typeof raw === "string") {
    const parsed = tryParseJson(raw);
    if (parsed.ok && Array.isArray(parsed.value)) return fromList(parsed.value);
    // a bare URL or a JSON scalar such as "\"a,b\"" is treated as plain text
    return splitOnCommas(raw);
  }

  return [];
};
