import { test } from "node:test";
import assert from "node:assert/strict";

import { TOML } from "../deps.ts";
import { isCompilerSettings } from "./config.ts";

test('settings: empty document is valid', () => {
  assert.equal(isCompilerSettings({}), true);
});

test('settings: full document parses', () => {
  const raw = TOML.parse(`
zones_dir = "dns/zones"
output_dir = "dns/compiled"
default_ttl = 600

[provider]
type = "cloudflare"
token_env = "CF_TOKEN"
pagerules = true
`);
  assert.equal(isCompilerSettings(raw), true);
});

test('settings: wrong shapes are rejected', () => {
  assert.equal(isCompilerSettings([]), false);
  assert.equal(isCompilerSettings({ zones_dir: 5 }), false);
  assert.equal(isCompilerSettings({ default_ttl: 1.5 }), false);
  assert.equal(isCompilerSettings({ provider: { type: 'bind' } }), false);
  assert.equal(isCompilerSettings({ provider: { type: 'route53', access_key_id_env: 'not a name' } }), false);
  assert.equal(isCompilerSettings({ provider: { type: 'cloudflare', pagerules: 'no' } }), false);
});
