export interface CompilerSettings {
  zones_dir?: string;
  output_dir?: string;
  config_file?: string;
  default_ttl?: number;

  provider?: ProviderConfig;
}
export function isCompilerSettings(raw: unknown): raw is CompilerSettings {
  if (!isTable(raw)) return false;

  for (const key of ['zones_dir', 'output_dir', 'config_file'] as const) {
    if (raw[key] !== undefined && typeof raw[key] !== 'string') return false;
  }
  if (raw.default_ttl !== undefined) {
    if (typeof raw.default_ttl !== 'number' || !Number.isInteger(raw.default_ttl) || raw.default_ttl < 0) return false;
  }

  if (raw.provider !== undefined && !isProviderConfig(raw.provider)) return false;

  return true;
}

export interface CloudflareProviderConfig {
  type: "cloudflare";
  token_env?: string;
  pagerules?: boolean;
}
export interface Route53ProviderConfig {
  type: "route53";
  access_key_id_env?: string;
  secret_access_key_env?: string;
}
export interface DigitalOceanProviderConfig {
  type: "digitalocean";
  token_env?: string;
}
export type ProviderConfig =
| CloudflareProviderConfig
| Route53ProviderConfig
| DigitalOceanProviderConfig
;

const ProviderEnvKeys: Record<ProviderConfig['type'], Array<string>> = {
  cloudflare: ['token_env'],
  route53: ['access_key_id_env', 'secret_access_key_env'],
  digitalocean: ['token_env'],
};

function isProviderConfig(raw: unknown): raw is ProviderConfig {
  if (!isTable(raw)) return false;
  const { type } = raw;
  if (type !== 'cloudflare' && type !== 'route53' && type !== 'digitalocean') return false;

  for (const key of ProviderEnvKeys[type]) {
    if (raw[key] !== undefined && !isEnvName(raw[key])) return false;
  }
  if (type == 'cloudflare' && raw.pagerules !== undefined && typeof raw.pagerules !== 'boolean') return false;

  return true;
}

function isEnvName(raw: unknown) {
  return typeof raw === 'string' && /^[A-Za-z_][A-Za-z0-9_]*$/.test(raw);
}

function isTable(raw: unknown): raw is Record<string, unknown> {
  return raw != null && typeof raw === 'object' && !Array.isArray(raw);
}
