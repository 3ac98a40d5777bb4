export type RawProduct = Record<string, unknown>;

export type MetaDataEntry = {
  id?: number;
  key: string;
  value: unknown;
};

export type CatalogProduct = {
  id: number;
  name: string;
  metaData: MetaDataEntry[];
};

export class InvalidProductError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidProductError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseProductId = (value: unknown): number => {
  if (value == null) {
    throw new InvalidProductError("Invalid product: missing id");
  }

  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value.trim())
        ? Number.parseInt(value.trim(), 10)
        : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidProductError("Invalid product: id must be a positive integer");
  }
  return parsed;
};

const parseMetaData = (value: unknown): MetaDataEntry[] => {
  if (!Array.isArray(value)) return [];

  return value.flatMap((entry): MetaDataEntry[] => {
    if (!isRecord(entry) || typeof entry.key !== "string") return [];
    const parsed: MetaDataEntry = { key: entry.key, value: entry.value };
    if (typeof entry.id === "number") parsed.id = entry.id;
    return [parsed];
  });
};

/**
 * Reads the three fields the migration cares about from a listing record.
 * Everything else on the record is ignored.
 */
export const parseCatalogProduct = (raw: RawProduct): CatalogProduct => ({
  id: parseProductId(raw.id),
  name: typeof raw.name === "string" ? raw.name : "",
  metaData: parseMetaData(raw.meta_data)
});
