export * from './audibleApi';
export * from './audibleAuth';
export * from './config';
export * from './constants';
export * from './credentials';
export * from './errors';
export * from './exporter';
export * from './library';
export * from './libraryCsv';
export * from './locales';
export * from './logger';
export * from './prompt';
export * from './provisioner';
export * from './sampleData';
export type * from './types';
