import { SETTING_KEYS } from "./constants";
import { resolveHeadingPolicy, type HeadingPolicy } from "./HeadingPolicy";
import { resolveRelevancePolicy, type RelevancePolicy } from "./RelevancePolicy";
import { OutlineLensValidationError } from "../errors";

/**
 * Anything that can answer setting lookups: the elizaOS runtime, or
 * `envSettings` for scripts.
 */
export interface SettingSource {
  getSetting(key: string): unknown;
}

export const envSettings: SettingSource = {
  getSetting: (key: string) => process.env[key],
};

export function readStringSetting(source: SettingSource, key: string): string | undefined {
  const raw = source.getSetting(key);
  if (raw === undefined || raw === null) return undefined;
  const value = String(raw).trim();
  return value.length > 0 ? value : undefined;
}

function readNumberSetting(source: SettingSource, key: string): number | undefined {
  const value = readStringSetting(source, key);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw OutlineLensValidationError.invalidFormat(key, "a number", value, { operation: "settings" });
  }
  return parsed;
}

export function headingPolicyFromSettings(source: SettingSource): HeadingPolicy {
  const overrides: Partial<HeadingPolicy> = {};
  const h1Ratio = readNumberSetting(source, SETTING_KEYS.H1_RATIO);
  const h2Ratio = readNumberSetting(source, SETTING_KEYS.H2_RATIO);
  const h3Ratio = readNumberSetting(source, SETTING_KEYS.H3_RATIO);
  const maxHeadingWords = readNumberSetting(source, SETTING_KEYS.MAX_HEADING_WORDS);
  if (h1Ratio !== undefined) overrides.h1Ratio = h1Ratio;
  if (h2Ratio !== undefined) overrides.h2Ratio = h2Ratio;
  if (h3Ratio !== undefined) overrides.h3Ratio = h3Ratio;
  if (maxHeadingWords !== undefined) overrides.maxHeadingWords = maxHeadingWords;
  return resolveHeadingPolicy(overrides);
}

export function relevancePolicyFromSettings(source: SettingSource): RelevancePolicy {
  const overrides: Partial<RelevancePolicy> = {};
  const topK = readNumberSetting(source, SETTING_KEYS.TOP_K);
  const minSentenceChars = readNumberSetting(source, SETTING_KEYS.MIN_SENTENCE_CHARS);
  if (topK !== undefined) overrides.topK = topK;
  if (minSentenceChars !== undefined) overrides.minSentenceChars = minSentenceChars;
  return resolveRelevancePolicy(overrides);
}

/** `OUTLINE_LENS_EMBEDDINGS=off` (or false/0) forces keyword scoring */
export function embeddingsEnabled(source: SettingSource): boolean {
  const value = readStringSetting(source, SETTING_KEYS.EMBEDDINGS)?.toLowerCase();
  return !(value === "off" || value === "false" || value === "0");
}
