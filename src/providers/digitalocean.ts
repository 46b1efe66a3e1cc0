import type { DigitalOceanProviderConfig } from "../defs/config.ts";
import type { ProviderBinding } from "../defs/types.ts";

export class DigitalOceanBinding implements ProviderBinding {
  constructor(
    public config: DigitalOceanProviderConfig,
  ) {}
  readonly providerId = 'digitalocean';

  RenderSettings() {
    return {
      class: 'octodns_digitalocean.DigitalOceanProvider',
      token: `env/${this.RequiredEnvironment()[0]}`,
    };
  }

  RequiredEnvironment() {
    return [this.config.token_env ?? 'DIGITALOCEAN_TOKEN'];
  }
}
