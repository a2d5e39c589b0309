export { PiiDetectionService, RecognizerTimeoutError } from './detection.service.js';
export type { DetectionOptions } from './detection.service.js';
