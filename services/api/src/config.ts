export interface ApiConfig {
  port: number;
  maxUploadBytes: number;
  downloadName: string;
}

export const API_CONFIG = Symbol('API_CONFIG');

export const DEFAULT_DOWNLOAD_NAME = 'labels.pdf';

export type EnvReader = (name: string) => string | undefined;

export function parseIntEnv(read: EnvReader, name: string, fallback: number): number {
  const value = read(name);
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadApiConfig(read: EnvReader = (name) => process.env[name]): ApiConfig {
  return {
    port: parseIntEnv(read, 'PORT', 3000),
    maxUploadBytes: parseIntEnv(read, 'MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
    downloadName: read('LABELS_DOWNLOAD_NAME') || DEFAULT_DOWNLOAD_NAME
  };
}
