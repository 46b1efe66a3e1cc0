import { test } from "node:test";
import assert from "node:assert/strict";

import type { SourcedRecordSet } from "../defs/types.ts";
import { remapName, remapRecords, subdomainLabel } from "./remap.ts";

test('remap: label from a file named after the subdomain', () => {
  assert.equal(subdomainLabel('example.com', 'sub.example.com.yml'), 'sub');
  assert.equal(subdomainLabel('example.com', 'api.v1.example.com.yaml'), 'api.v1');
});

test('remap: label from an already-relative file name', () => {
  assert.equal(subdomainLabel('example.com', 'staging.yml'), 'staging');
  assert.equal(subdomainLabel('example.com', 'notexample.com.yml'), 'notexample.com');
});

test('remap: apex file has an empty label', () => {
  assert.equal(subdomainLabel('example.com', 'example.com.yml'), '');
});

test('remap: subdomain names move under the label', () => {
  assert.equal(remapName('', 'sub'), 'sub');
  assert.equal(remapName('www', 'sub'), 'www.sub');
  assert.equal(remapName('_acme-challenge.www', 'api.v1'), '_acme-challenge.www.api.v1');
});

test('remap: apex file names are untouched', () => {
  assert.equal(remapName('', ''), '');
  assert.equal(remapName('www', ''), 'www');
});

test('remap: records keep their source location', () => {
  const records: SourcedRecordSet[] = [{
    source: { file: 'zones/example.com/sub.example.com.yml', name: '' },
    record: { name: '', ttl: 300, type: 'A', values: ['10.0.0.1'] },
  }, {
    source: { file: 'zones/example.com/sub.example.com.yml', name: 'www' },
    record: { name: 'www', ttl: 300, type: 'CNAME', value: 'sub.example.com.' },
  }];

  assert.deepEqual(remapRecords(records, 'sub'), [{
    source: { file: 'zones/example.com/sub.example.com.yml', name: '' },
    record: { name: 'sub', ttl: 300, type: 'A', values: ['10.0.0.1'] },
  }, {
    source: { file: 'zones/example.com/sub.example.com.yml', name: 'www' },
    record: { name: 'www.sub', ttl: 300, type: 'CNAME', value: 'sub.example.com.' },
  }]);
});
