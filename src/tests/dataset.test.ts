import assert from 'node:assert/strict';
import test from 'node:test';

import { attrText, createDataset, generateDatasetId, hasMetadata } from '../dataset.js';

test('generateDatasetId replaces symbols and lower cases', () => {
  assert.equal(generateDatasetId('SST Monthly (v2)'), 'sst_monthly__v2_');
  assert.equal(generateDatasetId('chl-a.nc'), 'chl_a_nc');
});

test('generateDatasetId always starts with a letter', () => {
  assert.equal(generateDatasetId('2024 sst'), 'ds_2024_sst');
  assert.equal(generateDatasetId('_hidden'), 'ds__hidden');
  assert.equal(generateDatasetId(''), 'ds_');
});

test('generateDatasetId is deterministic and only uses [a-z0-9_]', () => {
  const names = ['Température de surface', 'SST/Monthly', '  spaces  ', '9lives', 'ÅÄÖ', 'ok_name', 'a.b-c d'];
  for (const name of names) {
    const id = generateDatasetId(name);
    assert.match(id, /^[a-z][a-z0-9_]*$/, name);
    assert.equal(generateDatasetId(name), id);
  }
});

test('createDataset keeps a declared id', () => {
  const ds = createDataset('SST', 'https://example.org/dodsC/sst.nc', 'thredds', 'sstDaily');
  assert.equal(ds.id, 'sstDaily');
  assert.equal(ds.metadata, 'pending');
  assert.equal(ds.global.size, 0);
  assert.equal(ds.variables.size, 0);

  assert.equal(createDataset('SST Daily', 'https://example.org/sst', 'hyrax', '').id, 'sst_daily');
  assert.equal(createDataset('SST Daily', 'https://example.org/sst', 'hyrax', null).id, 'sst_daily');
});

test('hasMetadata needs a global attribute or a variable section', () => {
  const ds = createDataset('sst', 'https://example.org/sst', 'hyrax');
  assert.equal(hasMetadata(ds), false);

  ds.variables.set('sst', new Map());
  assert.equal(hasMetadata(ds), true);

  const other = createDataset('chl', 'https://example.org/chl', 'hyrax');
  other.global.set('title', { type: 'string', value: 'Chlorophyll' });
  assert.equal(hasMetadata(other), true);
});

test('attrText writes numbers as they were written in the DAS', () => {
  assert.equal(attrText({ type: 'string', value: 'K' }), 'K');
  assert.equal(attrText({ type: 'float', value: -999, raw: '-999.0' }), '-999.0');
  assert.equal(attrText({ type: 'int', value: 7, raw: '+7' }), '+7');
});
