import type { ProviderConfig } from "../defs/config.ts";
import type { ProviderBinding } from "../defs/types.ts";
import { CloudflareBinding } from "./cloudflare.ts";
import { DigitalOceanBinding } from "./digitalocean.ts";
import { Route53Binding } from "./route53.ts";

export function configureProvider(config: ProviderConfig): ProviderBinding {
  switch (config.type) {
    case 'cloudflare':
      return new CloudflareBinding(config);
    case 'route53':
      return new Route53Binding(config);
    case 'digitalocean':
      return new DigitalOceanBinding(config);
    default: {
      const _: never = config;
    }
  }
  throw new Error(`Invalid provider 'type' ${JSON.stringify(config)}`);
};
