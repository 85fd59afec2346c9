import type { Detector } from './types.js';
import { IdentityDetector } from './identity.js';
import { TopicDetector } from './topic.js';
import { HardFailDetector } from './hardfail.js';

export { scanPatterns, type Detector, type DetectorKind, type DetectedSpan, type SpanPattern } from './types.js';
export {
  IdentityDetector,
  IDENTITY_CLASSES,
  luhnCheck,
  loadNameList,
  type IdentityDetectorOptions,
} from './identity.js';
export { TopicDetector, loadTopicLexicon, type TopicLexicon, type TopicDetectorOptions } from './topic.js';
export { HardFailDetector } from './hardfail.js';

/**
 * The built-in chain, in evaluation order: identity, topic, hard-fail.
 */
export function defaultDetectors(): Detector[] {
  return [new IdentityDetector(), new TopicDetector(), new HardFailDetector()];
}
