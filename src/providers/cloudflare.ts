import type { CloudflareProviderConfig } from "../defs/config.ts";
import type { ProviderBinding } from "../defs/types.ts";

export class CloudflareBinding implements ProviderBinding {
  constructor(
    public config: CloudflareProviderConfig,
  ) {}
  readonly providerId = 'cloudflare';

  get tokenEnv() {
    return this.config.token_env ?? 'CLOUDFLARE_API_TOKEN';
  }

  RenderSettings() {
    return {
      class: 'octodns_cloudflare.CloudflareProvider',
      token: `env/${this.tokenEnv}`,
      // page rules aren't DNS records and don't belong in zone files
      pagerules: this.config.pagerules ?? false,
    };
  }

  RequiredEnvironment() {
    return [this.tokenEnv];
  }
}
