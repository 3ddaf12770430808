/**
 * CLI Types
 */

export interface CachedImage {
  imageURL: string;
  digest: string;
  tags: string[];
}

export interface DesiredImage {
  imageURL: string;
  digest: string | null;
  displayName: string;
}

export interface TargetSnapshot {
  name: string;
  labels: Record<string, string>;
  commonCache: CachedImage[];
  available: DesiredImage[];
  desired: DesiredImage[];
  missing: DesiredImage[];
  all: DesiredImage[];
  pulling: string | null;
  lastCheckedAt: string | null;
  lastError: string | null;
}

export interface ImagesResponse {
  images: DesiredImage[];
  all: DesiredImage[];
}

export type OutputFormat = 'json' | 'table' | 'simple';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'simple'];

export interface Config {
  endpoint: string;
  output: OutputFormat;
}

export interface APIError {
  code: number;
  message: string;
  details?: string;
}
