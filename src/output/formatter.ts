import * as yaml from 'js-yaml';
import { ConfigError } from '../errors';
import { OutputFormat, TokenResult } from '../types';

export const OUTPUT_FORMATS: OutputFormat[] = ['text', 'json', 'yaml'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Snake-case record shared by the JSON and YAML renderings
 */
export interface SerializedTokenResult {
  access_token: string;
  token_type: string;
  expires_in: number;
  expires_at: string;
  scope?: string;
  metadata?: Record<string, string | number>;
}

export function serializeTokenResult(result: TokenResult): SerializedTokenResult {
  const serialized: SerializedTokenResult = {
    access_token: result.accessToken,
    token_type: result.tokenType,
    expires_in: result.expiresInSeconds,
    expires_at: result.expiresAt.toISOString()
  };
  if (result.scope) {
    serialized.scope = result.scope;
  }

  const metadata: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(result.metadata)) {
    if (value !== undefined) {
      metadata[key] = value;
    }
  }
  if (Object.keys(metadata).length > 0) {
    serialized.metadata = metadata;
  }
  return serialized;
}

export function formatTokenResult(result: TokenResult, format: string = 'text'): string {
  if (!isOutputFormat(format)) {
    throw new ConfigError('output_format', `Unsupported output format "${format}". Supported formats: ${OUTPUT_FORMATS.join(', ')}`);
  }

  switch (format) {
    case 'json':
      return JSON.stringify(serializeTokenResult(result), null, 2) + '\n';
    case 'yaml':
      return yaml.dump(serializeTokenResult(result));
    case 'text': {
      const lines = [
        'Token Generation Result:',
        '=======================',
        `Access Token: ${result.accessToken}`,
        `Token Type: ${result.tokenType}`,
        `Expires In: ${result.expiresInSeconds} seconds`,
        `Expires At: ${result.expiresAt.toISOString()}`
      ];
      if (result.scope) {
        lines.push(`Scope: ${result.scope}`);
      }
      return lines.join('\n') + '\n';
    }
  }
}
