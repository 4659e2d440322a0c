export { detectCategories, mergeReports, decodeText, type DetectionReport, type CategorySpan } from './detector.js';
export { extractRequestText, extractResponseText, extractStreamText, extractModel } from './extract.js';
export { detectMarkers, type ResponseMarker } from './markers.js';
export { SENSITIVE_CATEGORIES, luhnValid, type SensitiveCategory } from './patterns.js';
export { extractToolCalls, extractUsage, type TokenUsage } from './usage.js';
