import { invalidInput } from "./errors";
import type { Quality } from "./types";

export const DEFAULT_QUALITY: Quality = "1080p";

const QUALITY_RE = /^(\d{3,4})p$/;

export const qualityHeight = (value: string): number | null => {
  const match = QUALITY_RE.exec(value.trim().toLowerCase());
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
};

export const normalizeQuality = (value: string | undefined, provider?: string): Quality => {
  if (value === undefined || value.trim() === "") return DEFAULT_QUALITY;
  const height = qualityHeight(value);
  if (height === null) {
    throw invalidInput(`Unrecognized quality: ${value}`, { provider, operation: "videoUrl" });
  }
  return `${height}p`;
};

/** Highest first, duplicates and unparsable labels dropped. */
export const sortQualities = (qualities: readonly string[]): Quality[] => {
  const heights = new Set<number>();
  for (const quality of qualities) {
    const height = qualityHeight(quality);
    if (height !== null) heights.add(height);
  }
  return [...heights].sort((left, right) => right - left).map((height) => `${height}p`);
};

/**
 * Picks the best available quality that does not exceed the requested one.
 * Returns null when every offered level is above the request.
 */
export const resolveQuality = (requested: Quality, available: readonly Quality[]): Quality | null => {
  const ceiling = qualityHeight(requested);
  if (ceiling === null) return null;
  for (const candidate of sortQualities(available)) {
    const height = qualityHeight(candidate);
    if (height !== null && height <= ceiling) {
      return candidate;
    }
  }
  return null;
};

export const exceedsQuality = (actual: Quality, requested: Quality): boolean => {
  const actualHeight = qualityHeight(actual);
  const ceiling = qualityHeight(requested);
  if (actualHeight === null || ceiling === null) return false;
  return actualHeight > ceiling;
};
