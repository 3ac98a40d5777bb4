import { normalizeImageUrls } from "../image-url/normalizeImageUrls";
import { type ImageUrlRewriteRule, transformImageUrl } from "../image-url/transformImageUrl";
import type { CatalogProduct, MetaDataEntry } from "./product";

export type ImageUrlChange = {
  position: number;
  oldUrl: string;
  newUrl: string;
};

export type ImageUrlSkipReason = "missing_field" | "no_urls" | "unchanged";

export type ImageUrlUpdatePlan =
  | {
      action: "skip";
      reason: ImageUrlSkipReason;
    }
  | {
      action: "update";
      urls: string[];
      changes: ImageUrlChange[];
      metaData: MetaDataEntry[];
    };

export type PlanOptions = {
  metaKey: string;
  rule: ImageUrlRewriteRule;
};

/**
 * Decides whether a product needs its image URLs rewritten.
 *
 * The returned `metaData` is a copy of the product's entries with the designated
 * entry's value replaced; the product itself is left untouched.
 */
export const planImageUrlUpdate = (product: CatalogProduct, options: PlanOptions): ImageUrlUpdatePlan => {
  const entryIndex = product.metaData.findIndex((entry) => entry.key === options.metaKey);
  if (entryIndex === -1) return { action: "skip", reason: "missing_field" };

  const urls = normalizeImageUrls(product.metaData[entryIndex]?.value);
  if (urls.length === 0) return { action: "skip", reason: "no_urls" };

  const rewritten = urls.map((url) => transformImageUrl(url, options.rule));
  const changes = urls.flatMap((oldUrl, position): ImageUrlChange[] => {
    const newUrl = rewritten[position] ?? oldUrl;
    return newUrl === oldUrl ? [] : [{ position, oldUrl, newUrl }];
  });
  if (changes.length === 0) return { action: "skip", reason: "unchanged" };

  const metaData = product.metaData.map((entry, index) =>
    index === entryIndex ? { ...entry, value: rewritten } : { ...entry }
  );

  return { action: "update", urls: rewritten, changes, metaData };
};
