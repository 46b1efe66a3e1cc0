import { test } from "node:test";
import assert from "node:assert/strict";

import {
  getContentKey, isValidRelativeName,
  parseRecordDefinition, readRecordDocument,
} from "./records.ts";

test('records: single value becomes a one-entry list', () => {
  assert.deepEqual(parseRecordDefinition('www', {
    type: 'A', ttl: 300, value: '10.0.0.1',
  }), {
    name: 'www', ttl: 300, type: 'A', values: ['10.0.0.1'],
  });
});

test('records: value lists are sorted and de-duplicated', () => {
  const record = parseRecordDefinition('', {
    type: 'TXT', ttl: 60, values: ['v=spf1 -all', 'google-site-verification=x', 'v=spf1 -all'],
  });
  assert.deepEqual(record, {
    name: '', ttl: 60, type: 'TXT',
    values: ['google-site-verification=x', 'v=spf1 -all'],
  });
});

test('records: structured values sort on their serialized form', () => {
  const record = parseRecordDefinition('', {
    type: 'MX', ttl: 3600, values: [
      { preference: 5, exchange: 'b.mx.example.net.' },
      { preference: 10, exchange: 'a.mx.example.net.' },
    ],
  });
  // '{"preference":10' sorts before '{"preference":5'
  assert.deepEqual(record, {
    name: '', ttl: 3600, type: 'MX', values: [
      { preference: 10, exchange: 'a.mx.example.net.' },
      { preference: 5, exchange: 'b.mx.example.net.' },
    ],
  });
});

test('records: MX without preference is rejected', () => {
  assert.throws(() => parseRecordDefinition('', {
    type: 'MX', ttl: 300, value: { exchange: 'mx.example.net.' },
  }), { name: 'RecordProblem', message: 'MX value is missing "preference"' });
});

test('records: SRV needs priority, weight, port and target', () => {
  assert.throws(() => parseRecordDefinition('_sip._tcp', {
    type: 'SRV', ttl: 300, values: [{ priority: 10, weight: 20 }],
  }), { message: 'SRV value is missing "port", "target"' });

  assert.throws(() => parseRecordDefinition('_sip._tcp', {
    type: 'SRV', ttl: 300, values: [{ weight: 20, port: 5060, target: 'sip.example.com.' }],
  }), { message: 'SRV value is missing "priority"' });

  assert.deepEqual(parseRecordDefinition('_sip._tcp', {
    type: 'SRV', ttl: 300, value: { priority: 10, weight: 20, port: 5060, target: 'sip.example.com.' },
  }), {
    name: '_sip._tcp', ttl: 300, type: 'SRV',
    values: [{ priority: 10, weight: 20, port: 5060, target: 'sip.example.com.' }],
  });
});

test('records: ttl and type are required', () => {
  assert.throws(() => parseRecordDefinition('www', { type: 'A', value: '10.0.0.1' }),
    { message: 'A record is missing "ttl"' });
  assert.throws(() => parseRecordDefinition('www', { ttl: 300, value: '10.0.0.1' }),
    { message: 'missing "type"' });
  assert.throws(() => parseRecordDefinition('www', { type: 'A', ttl: -5, value: '10.0.0.1' }),
    { message: '"ttl" must be a non-negative integer' });
});

test('records: unknown types and fields are rejected', () => {
  assert.throws(() => parseRecordDefinition('', { type: 'SOA', ttl: 300, value: 'x' }),
    { message: 'unsupported record type SOA' });
  assert.throws(() => parseRecordDefinition('www', { type: 'A', ttl: 300, value: '10.0.0.1', proxied: true }),
    { message: 'unexpected field "proxied"' });
  assert.throws(() => parseRecordDefinition('www', { type: 'CNAME', ttl: 300, values: ['a.example.com.'] }),
    { message: 'CNAME record takes a single "value"' });
  assert.throws(() => parseRecordDefinition('www', { type: 'A', ttl: 300 }),
    { message: 'A record has neither "value" nor "values"' });
});

test('records: CAA flags default to zero', () => {
  assert.deepEqual(parseRecordDefinition('', {
    type: 'CAA', ttl: 3600, value: { tag: 'issue', value: 'letsencrypt.org' },
  }), {
    name: '', ttl: 3600, type: 'CAA', values: [{ flags: 0, tag: 'issue', value: 'letsencrypt.org' }],
  });
});

test('records: octodns metadata is kept', () => {
  const record = parseRecordDefinition('www', {
    type: 'CNAME', ttl: 300, value: 'app.example.net.',
    octodns: { cloudflare: { proxied: true } },
  });
  assert.deepEqual(record.octodns, { cloudflare: { proxied: true } });
});

test('records: value and values compare as the same content', () => {
  const single = parseRecordDefinition('www', { type: 'A', ttl: 300, value: '10.0.0.1' });
  const list = parseRecordDefinition('www', { type: 'A', ttl: 300, values: ['10.0.0.1'] });
  assert.equal(getContentKey(single), getContentKey(list));

  const longer = parseRecordDefinition('www', { type: 'A', ttl: 600, value: '10.0.0.1' });
  assert.notEqual(getContentKey(single), getContentKey(longer));
});

test('records: a document reports every bad definition', () => {
  const { records, problems } = readRecordDocument({
    '': [
      { type: 'A', ttl: 300, value: '10.0.0.1' },
      { type: 'MX', ttl: 300, value: { exchange: 'mx.example.net.' } },
    ],
    'www': { type: 'CNAME', ttl: 300, value: 'example.com.' },
    'Bad.Name': { type: 'A', ttl: 300, value: '10.0.0.2' },
  }, 'zones/example.com/example.com.yml');

  assert.deepEqual(records.map(x => [x.source.name, x.record.type]), [
    ['', 'A'],
    ['www', 'CNAME'],
  ]);
  assert.deepEqual(records[0]?.source.file, 'zones/example.com/example.com.yml');
  assert.deepEqual(problems, [
    { name: '', problem: 'MX value is missing "preference"' },
    { name: 'Bad.Name', problem: 'invalid record name' },
  ]);
});

test('records: relative names', () => {
  assert.equal(isValidRelativeName(''), true);
  assert.equal(isValidRelativeName('www'), true);
  assert.equal(isValidRelativeName('*.dev'), true);
  assert.equal(isValidRelativeName('_dmarc'), true);
  assert.equal(isValidRelativeName('a.*'), false);
  assert.equal(isValidRelativeName('www.'), false);
  assert.equal(isValidRelativeName('-bad'), false);
  assert.equal(isValidRelativeName('WWW'), false);
});
