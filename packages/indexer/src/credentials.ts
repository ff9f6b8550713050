import { ConfigurationError } from './errors';

export const PROVIDER_KEY_VARS = {
  openai: 'OPENAI_API_KEY',
  huggingface: 'HF_API_KEY',
} as const;

export type Env = Record<string, string | undefined>;

/** API keys come from the environment only, never from configuration files. */
export function requireCredential(variable: string, env: Env = process.env): string {
  const value = env[variable]?.trim();
  if (!value) throw new ConfigurationError(`${variable} is not set`);
  return value;
}
