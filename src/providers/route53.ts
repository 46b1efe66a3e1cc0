import type { Route53ProviderConfig } from "../defs/config.ts";
import type { ProviderBinding } from "../defs/types.ts";

export class Route53Binding implements ProviderBinding {
  constructor(
    public config: Route53ProviderConfig,
  ) {}
  readonly providerId = 'route53';

  RenderSettings() {
    const [accessKeyEnv, secretKeyEnv] = this.RequiredEnvironment();
    return {
      class: 'octodns_route53.Route53Provider',
      access_key_id: `env/${accessKeyEnv}`,
      secret_access_key: `env/${secretKeyEnv}`,
    };
  }

  RequiredEnvironment() {
    return [
      this.config.access_key_id_env ?? 'AWS_ACCESS_KEY_ID',
      this.config.secret_access_key_env ?? 'AWS_SECRET_ACCESS_KEY',
    ];
  }
}
