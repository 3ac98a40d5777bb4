import {
  assertIdempotentRule,
  defaultImageUrlRewriteRule,
  type ImageUrlRewriteRule
} from "../../core/image-url/transformImageUrl";

export type MigrationConfig = {
  pageSize: number;
  startPage: number;
  endPage: number;
  pageDelayMs: number;
  itemDelayMs: number;
  metaKey: string;
  rewriteRule: ImageUrlRewriteRule;
};

export type MigrationConfigInput = Partial<Omit<MigrationConfig, "rewriteRule">> & {
  rewriteRule?: Partial<ImageUrlRewriteRule>;
};

export const defaultMigrationConfig: MigrationConfig = {
  pageSize: 20,
  startPage: 1,
  endPage: 50,
  pageDelayMs: 800,
  itemDelayMs: 0,
  metaKey: "product_images_url",
  rewriteRule: defaultImageUrlRewriteRule
};

export const migrationCaps = {
  pageSize: { min: 1, max: 100 },
  page: { min: 1, max: 100000 },
  delayMs: { min: 0, max: 60000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateMigrationConfig = (config: MigrationConfig): MigrationConfig => {
  assertIntegerInRange("pageSize", config.pageSize, migrationCaps.pageSize.min, migrationCaps.pageSize.max);
  assertIntegerInRange("startPage", config.startPage, migrationCaps.page.min, migrationCaps.page.max);
  assertIntegerInRange("endPage", config.endPage, migrationCaps.page.min, migrationCaps.page.max);
  assertIntegerInRange("pageDelayMs", config.pageDelayMs, migrationCaps.delayMs.min, migrationCaps.delayMs.max);
  assertIntegerInRange("itemDelayMs", config.itemDelayMs, migrationCaps.delayMs.min, migrationCaps.delayMs.max);
  if (config.endPage < config.startPage) {
    throw new Error(`endPage=${config.endPage} must be >= startPage=${config.startPage}`);
  }
  if (config.metaKey === "") {
    throw new Error("metaKey must not be empty");
  }
  assertIdempotentRule(config.rewriteRule);
  return config;
};

export const resolveMigrationConfig = (input: MigrationConfigInput = {}): MigrationConfig =>
  validateMigrationConfig({
    ...defaultMigrationConfig,
    ...input,
    metaKey: input.metaKey?.trim() ?? defaultMigrationConfig.metaKey,
    rewriteRule: { ...defaultMigrationConfig.rewriteRule, ...input.rewriteRule }
  });
