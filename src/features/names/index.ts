export { NameExtractor } from './name-extractor.js';
