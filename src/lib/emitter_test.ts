import { after, test } from "node:test";
import assert from "node:assert/strict";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";

import { CloudflareBinding } from "../providers/cloudflare.ts";
import { Route53Binding } from "../providers/route53.ts";
import {
  pruneCompiledZones, renderProviderConfig,
  renderZoneDocument, writeCompiledZone,
} from "./emitter.ts";
import { makeTree, quietLogs, removeTree } from "./test-utils.ts";

quietLogs();

test('emitter: zone document layout', () => {
  const text = renderZoneDocument({
    apex: 'example.com',
    records: [
      { name: '', ttl: 300, type: 'A', values: ['10.0.0.1'] },
      { name: '', ttl: 300, type: 'MX', values: [{ preference: 10, exchange: 'mx.example.net.' }] },
      { name: '', ttl: 300, type: 'TXT', values: ['first', 'second'] },
      { name: 'sub', ttl: 300, type: 'A', values: ['10.0.0.2'] },
      { name: 'www', ttl: 600, type: 'CNAME', value: 'example.com.' },
    ],
  });
  assert.equal(text, [
    `---`,
    `'':`,
    `  - type: A`,
    `    ttl: 300`,
    `    value: 10.0.0.1`,
    `  - type: MX`,
    `    ttl: 300`,
    `    value:`,
    `      preference: 10`,
    `      exchange: mx.example.net.`,
    `  - type: TXT`,
    `    ttl: 300`,
    `    values:`,
    `      - first`,
    `      - second`,
    `sub:`,
    `  type: A`,
    `  ttl: 300`,
    `  value: 10.0.0.2`,
    `www:`,
    `  type: CNAME`,
    `  ttl: 600`,
    `  value: example.com.`,
    ``,
  ].join('\n'));
});

test('emitter: empty zone still has an apex key', () => {
  assert.equal(renderZoneDocument({ apex: 'example.com', records: [] }), `---\n'': []\n`);
});

test('emitter: numeric names keep code-unit order after the apex', () => {
  const text = renderZoneDocument({
    apex: '0.168.192.in-addr.arpa',
    records: [
      { name: '', ttl: 300, type: 'NS', values: ['ns1.example.net.', 'ns2.example.net.'] },
      { name: '10', ttl: 300, type: 'PTR', value: 'host10.example.com.' },
      { name: '2', ttl: 300, type: 'PTR', value: 'host2.example.com.' },
    ],
  });
  assert.equal(text, [
    `---`,
    `'':`,
    `  type: NS`,
    `  ttl: 300`,
    `  values:`,
    `    - ns1.example.net.`,
    `    - ns2.example.net.`,
    `'10':`,
    `  type: PTR`,
    `  ttl: 300`,
    `  value: host10.example.com.`,
    `'2':`,
    `  type: PTR`,
    `  ttl: 300`,
    `  value: host2.example.com.`,
    ``,
  ].join('\n'));
});

test('emitter: a record named __proto__ is written like any other', () => {
  const text = renderZoneDocument({
    apex: 'example.com',
    records: [
      { name: '__proto__', ttl: 300, type: 'TXT', values: ['hello'] },
    ],
  });
  assert.equal(text, `---\n'': []\n__proto__:\n  type: TXT\n  ttl: 300\n  value: hello\n`);
});

test('emitter: provider config uses a wildcard zone', () => {
  const text = renderProviderConfig({
    outputDir: 'compiled',
    defaultTtl: 300,
    provider: new CloudflareBinding({ type: 'cloudflare' }),
  });
  assert.equal(text, [
    `---`,
    `providers:`,
    `  config:`,
    `    class: octodns.provider.yaml.YamlProvider`,
    `    directory: compiled`,
    `    default_ttl: 300`,
    `    enforce_order: false`,
    `  cloudflare:`,
    `    class: octodns_cloudflare.CloudflareProvider`,
    `    token: env/CLOUDFLARE_API_TOKEN`,
    `    pagerules: false`,
    `zones:`,
    `  '*':`,
    `    sources:`,
    `      - config`,
    `    targets:`,
    `      - cloudflare`,
    ``,
  ].join('\n'));
});

test('emitter: provider credentials are references, never values', () => {
  const text = renderProviderConfig({
    outputDir: 'out',
    defaultTtl: 3600,
    provider: new Route53Binding({ type: 'route53', access_key_id_env: 'R53_KEY' }),
  });
  assert.ok(text.includes(`    access_key_id: env/R53_KEY\n`));
  assert.ok(text.includes(`    secret_access_key: env/AWS_SECRET_ACCESS_KEY\n`));
});

const outputDir = await makeTree({
  'gone.org.yaml': "---\n'': []\n",
  'failed.net.yaml': "---\n'': []\n",
  'notes.txt': "kept\n",
});
after(() => removeTree(outputDir));

test('emitter: writes zone files and prunes zones that no longer exist', async () => {
  const path = await writeCompiledZone(outputDir, { apex: 'example.com', records: [] });
  assert.equal(path, join(outputDir, 'example.com.yaml'));
  assert.equal(await readFile(path, 'utf-8'), `---\n'': []\n`);

  const removed = await pruneCompiledZones(outputDir, new Set(['example.com', 'failed.net']));
  assert.deepEqual(removed, ['gone.org']);
  assert.deepEqual((await readdir(outputDir)).sort(), ['example.com.yaml', 'failed.net.yaml', 'notes.txt']);
});
