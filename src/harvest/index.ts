export * from './FolderHarvester.js';
