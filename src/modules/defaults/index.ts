/**
 * BNPL Credit Protocol - Default Detector Module Export
 */

export { DefaultDetectorService, DefaultDetectorOptions, DetectorWiring, LoanRegistry } from './default-detector.service';
