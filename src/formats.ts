import type { SourceFormat, TargetFormat, ToolName } from "./types.js";

export const SOURCE_FORMATS: readonly SourceFormat[] = ["flac", "wave"];

export const TARGET_FORMATS: readonly TargetFormat[] = ["opus", "aac", "flac", "wave"];

export const SOURCE_EXTENSIONS: Record<SourceFormat, string> = {
  flac: ".flac",
  wave: ".wav",
};

export const TARGET_EXTENSIONS: Record<TargetFormat, string> = {
  opus: ".opus",
  aac: ".m4a",
  flac: ".flac",
  wave: ".wav",
};

export type PairKey = `${SourceFormat}->${TargetFormat}`;

/** Executables each supported pair needs, located before dispatch. */
export const SUPPORTED_PAIRS: Readonly<Record<PairKey, readonly ToolName[]>> = {
  "flac->opus": ["flac", "metaflac", "opusenc"],
  "flac->aac": ["flac", "metaflac", "neroAacEnc", "neroAacTag"],
  "flac->flac": ["flac", "metaflac"],
  "flac->wave": ["flac"],
  "wave->opus": ["opusenc"],
  "wave->aac": ["neroAacEnc"],
  "wave->flac": ["flac"],
  "wave->wave": [],
};

export function pairKey(source: SourceFormat, target: TargetFormat): PairKey {
  return `${source}->${target}`;
}

export function isSourceFormat(value: string): value is SourceFormat {
  return SOURCE_FORMATS.some((format) => format === value);
}

export function isTargetFormat(value: string): value is TargetFormat {
  return TARGET_FORMATS.some((format) => format === value);
}

export function supportsCoverArt(target: TargetFormat): boolean {
  return target !== "wave";
}

export function requiredTools(source: SourceFormat, target: TargetFormat): ToolName[] {
  return [...SUPPORTED_PAIRS[pairKey(source, target)]];
}

export function opusComplexity(quality: number): string {
  return String(Math.round(quality / 10));
}

export function aacQuality(quality: number): string {
  return (quality / 100).toFixed(2);
}

export function flacCompressionLevel(quality: number): string {
  return `-${Math.round((quality * 8) / 100)}`;
}
