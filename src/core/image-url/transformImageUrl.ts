export type ImageUrlRewriteRule = {
  host: string;
  fromPath: string;
  toPath: string;
  fromExtension: string;
  toExtension: string;
};

export const defaultImageUrlRewriteRule: ImageUrlRewriteRule = {
  host: "static.recar.lt",
  fromPath: "/images/",
  toPath: "/pictures/",
  fromExtension: ".jpg",
  toExtension: ".webp"
};

export class InvalidRewriteRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRewriteRuleError";
  }
}

const maxRewritePasses = 4;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Rejects rules that would not be idempotent: a target that still contains its
 * source would be rewritten again on every pass over a resumed page.
 */
export const assertIdempotentRule = (rule: ImageUrlRewriteRule): ImageUrlRewriteRule => {
  if (rule.host.trim() === "") {
    throw new InvalidRewriteRuleError("Invalid rewrite rule: host must not be empty");
  }
  if (rule.fromPath === "" || rule.fromExtension === "") {
    throw new InvalidRewriteRuleError("Invalid rewrite rule: fromPath and fromExtension must not be empty");
  }
  if (rule.toPath.includes(rule.fromPath)) {
    throw new InvalidRewriteRuleError(
      `Invalid rewrite rule: toPath "${rule.toPath}" contains fromPath "${rule.fromPath}"`
    );
  }
  if (rule.toExtension.toLowerCase().includes(rule.fromExtension.toLowerCase())) {
    throw new InvalidRewriteRuleError(
      `Invalid rewrite rule: toExtension "${rule.toExtension}" contains fromExtension "${rule.fromExtension}"`
    );
  }
  return rule;
};

/**
 * Rewrites one image URL from the old hosting layout to the new one.
 *
 * URLs outside `rule.host` pass through untouched. Both substitutions are plain
 * substring replacements over the whole string, so a `fromPath` or
 * `fromExtension` occurring elsewhere in the URL is rewritten as well.
 */
export const transformImageUrl = (url: string, rule: ImageUrlRewriteRule = defaultImageUrlRewriteRule): string => {
  if (!url || !url.includes(rule.host)) return url;

  const extensionPattern = new RegExp(escapeRegExp(rule.fromExtension), "gi");
  const rewriteOnce = (value: string) =>
    value.split(rule.fromPath).join(rule.toPath).replace(extensionPattern, rule.toExtension);

  // Overlapping occurrences ("/images/images/") only surface after a first pass.
  let current = url;
  for (let pass = 0; pass < maxRewritePasses; pass += 1) {
    const next = rewriteOnce(current);
    if (next === current) break;
    current = next;
  }
  return current;
};
