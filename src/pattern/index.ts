export { compilePattern, slotFlags } from './compiler.js';
export { matchTag, filterTags } from './matcher.js';
export { compareVersions, compareExtracted, firstDifference } from './comparator.js';
export { classifyUpdates, extractCurrent } from './classifier.js';
