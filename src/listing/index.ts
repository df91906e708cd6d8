export { DirectoryEntryFilter } from './DirectoryEntryFilter.js';
