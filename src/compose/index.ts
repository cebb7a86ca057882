export * from './ComposeFile.js';
