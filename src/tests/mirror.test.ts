import assert from 'node:assert/strict';
import test from 'node:test';

import { scanDatasets } from '../erddap/config.file.js';
import { mirrorDatasets, rehostSourceUrls, rehostUrl } from '../erddap/mirror.js';

const Config = [
  '<erddapDatasets>',
  '<dataset type="EDDGridFromDap" datasetID="sst" active="true">',
  '  <sourceUrl>https://example.org/thredds/dodsC/sst.nc</sourceUrl>',
  '  <reloadEveryNMinutes>10080</reloadEveryNMinutes>',
  '</dataset>',
  '<dataset type="EDDTableFromErddap" datasetID="buoys" active="true">',
  '  <sourceUrl>https://origin.example.org/erddap/tabledap/buoys</sourceUrl>',
  '</dataset>',
  '<dataset type="EDDGridFromErddap" datasetID="chl">',
  '  <sourceUrl>http://origin.example.org:8080/erddap/griddap/chl?x=1&amp;y=2</sourceUrl>',
  '</dataset>',
  '<dataset type="EDDGridAggregateExistingDimension" datasetID="agg">',
  '  <dataset type="EDDGridFromDap" datasetID="agg_2020">',
  '    <sourceUrl>https://example.org/thredds/dodsC/2020.nc</sourceUrl>',
  '  </dataset>',
  '</dataset>',
  '<dataset type="EDDTableFromErddap" datasetID="local">',
  '  <sourceUrl>https://data.example.org/other/tabledap/local</sourceUrl>',
  '</dataset>',
  '</erddapDatasets>',
  '',
].join('\n');

function withLines(text: string, changes: Record<number, string>): string {
  return text
    .split('\n')
    .map((line, i) => changes[i] ?? line)
    .join('\n');
}

test('rehostUrl keeps the erddap path', () => {
  assert.equal(rehostUrl('https://origin.example.org/erddap/griddap/sst', 'https://mirror.example.org/'), 'https://mirror.example.org/erddap/griddap/sst');
  assert.equal(rehostUrl(' http://origin.example.org:8080/erddap ', 'https://mirror.example.org'), 'https://mirror.example.org/erddap');
  assert.equal(rehostUrl('https://origin.example.org/erddapx/sst', 'https://mirror.example.org'), null);
  assert.equal(rehostUrl('https://origin.example.org/thredds/dodsC/sst.nc', 'https://mirror.example.org'), null);
  assert.equal(rehostUrl('https://origin.example.org/other/erddap/sst', 'https://mirror.example.org'), null);
});

test('mirrorDatasets converts OPeNDAP grids and moves ERDDAP entries', () => {
  const res = mirrorDatasets(Config, scanDatasets(Config), {
    mirror: 'https://mirror.example.org/erddap/',
    origin: 'https://mirror.example.org',
  });
  assert.deepEqual(res.converted, ['sst']);
  assert.deepEqual(res.repointed, ['buoys', 'chl']);
  assert.equal(
    res.text,
    withLines(Config, {
      1: '<dataset type="EDDGridFromErddap" datasetID="sst" active="true">',
      2: '  <sourceUrl>https://mirror.example.org/erddap/griddap/sst</sourceUrl>',
      6: '  <sourceUrl>https://mirror.example.org/erddap/tabledap/buoys</sourceUrl>',
      9: '  <sourceUrl>https://mirror.example.org/erddap/griddap/chl?x=1&amp;y=2</sourceUrl>',
    }),
  );
});

test('mirrorDatasets leaves a mirrored file alone', () => {
  const target = { mirror: 'https://mirror.example.org/erddap', origin: 'https://mirror.example.org' };
  const once = mirrorDatasets(Config, scanDatasets(Config), target);
  const twice = mirrorDatasets(once.text, scanDatasets(once.text), target);
  assert.deepEqual(twice, { text: once.text, converted: [], repointed: [] });
});

test('rehostSourceUrls only touches ERDDAP urls', () => {
  const res = rehostSourceUrls(Config, 'https://mirror.example.org');
  assert.equal(res.changed, 2);
  assert.equal(
    res.text,
    withLines(Config, {
      6: '  <sourceUrl>https://mirror.example.org/erddap/tabledap/buoys</sourceUrl>',
      9: '  <sourceUrl>https://mirror.example.org/erddap/griddap/chl?x=1&amp;y=2</sourceUrl>',
    }),
  );
});

test('rehostSourceUrls reaches datasets nested in an aggregation', () => {
  const text = [
    '<erddapDatasets>',
    '<dataset type="EDDGridAggregateExistingDimension" datasetID="agg">',
    '  <dataset type="EDDGridFromErddap" datasetID="agg_a">',
    '    <sourceUrl>https://origin.example.org/erddap/griddap/a</sourceUrl>',
    '  </dataset>',
    '</dataset>',
    '</erddapDatasets>',
  ].join('\n');
  const res = rehostSourceUrls(text, 'https://mirror.example.org');
  assert.equal(res.changed, 1);
  assert.equal(res.text, withLines(text, { 3: '    <sourceUrl>https://mirror.example.org/erddap/griddap/a</sourceUrl>' }));
});
