export * from './availability.js';
export * from './catalog/catalog.js';
export * from './catalog/hyrax.js';
export * from './catalog/thredds.js';
export * from './das.js';
export * from './dataset.js';
export * from './erddap/config.file.js';
export * from './erddap/mirror.js';
export * from './erddap/remote.js';
export * from './erddap/xml.js';
export * from './filter.js';
export * from './http.js';
export * from './queue.js';
export * from './spider.js';
export * from './url.list.js';
