export { classify, STRONG_PII_TYPES } from './classifier.js';
export { registerClassificationRoutes } from './classification.routes.js';
export type { ClassificationRouteOptions } from './classification.routes.js';
